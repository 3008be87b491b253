/**
 * Delivers a rendered change report somewhere a person will see it
 */
export interface Notifier {
  readonly name: string

  /**
   * Send the report
   * @param message Report markup (HTML)
   * @returns Whether the message was delivered; failures are logged, never thrown
   */
  notify(message: string): Promise<boolean>
}

/**
 * One outbound request a push transport wants sent
 */
export interface PushRequest {
  url: string
  method: 'GET' | 'POST'
  headers?: Record<string, string>
  body?: string
}
