import { Notifier, PushRequest } from './Notifier'
import { debugLog, errorMessage } from '../debug/debugLog'

/**
 * Base implementation for transports that deliver with a single HTTP request
 */
export abstract class BaseNotifier implements Notifier {
  abstract readonly name: string

  constructor(
    protected token: string,
    protected title: string,
    protected timeoutMs: number
  ) {}

  /**
   * Build the request for this transport
   * Must be implemented by subclasses
   */
  protected abstract buildRequest(message: string): PushRequest

  async notify(message: string): Promise<boolean> {
    const request = this.buildRequest(message)

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: AbortSignal.timeout(this.timeoutMs),
      })

      if (!response.ok) {
        const text = await response.text()
        console.warn(`${this.name} notification failed with status ${response.status}: ${text}`)
        debugLog({ event: 'notify_failed', transport: this.name, status: response.status, body: text })
        return false
      }

      console.log(`Notification sent via ${this.name}`)
      debugLog({ event: 'notify_sent', transport: this.name })
      return true
    } catch (error) {
      console.warn(`${this.name} notification error: ${errorMessage(error)}`)
      debugLog({ event: 'notify_error', transport: this.name, error: errorMessage(error) })
      return false
    }
  }
}
