import { BaseNotifier } from './BaseNotifier'
import { PushRequest } from './Notifier'
import { stripMarkup } from '../formatting'

/**
 * Bark carries title and body in the URL path; the token is the device key
 */
export class BarkNotifier extends BaseNotifier {
  readonly name = 'bark'

  protected buildRequest(message: string): PushRequest {
    const title = encodeURIComponent(this.title)
    const body = encodeURIComponent(stripMarkup(message))

    return {
      url: `https://api.day.app/${encodeURIComponent(this.token)}/${title}/${body}`,
      method: 'GET',
    }
  }
}
