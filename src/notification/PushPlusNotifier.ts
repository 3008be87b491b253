import { BaseNotifier } from './BaseNotifier'
import { PushRequest } from './Notifier'

export const PUSHPLUS_URL = 'http://www.pushplus.plus/send'

/**
 * PushPlus takes the report as HTML
 */
export class PushPlusNotifier extends BaseNotifier {
  readonly name = 'pushplus'

  protected buildRequest(message: string): PushRequest {
    return {
      url: PUSHPLUS_URL,
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({
        token: this.token,
        title: this.title,
        content: message,
        template: 'html',
      }),
    }
  }
}
