import { BaseNotifier } from './BaseNotifier'
import { PushRequest } from './Notifier'
import { stripMarkup } from '../formatting'

export class ServerChanNotifier extends BaseNotifier {
  readonly name = 'serverchan'

  protected buildRequest(message: string): PushRequest {
    const form = new URLSearchParams({
      title: this.title,
      desp: stripMarkup(message),
    })

    return {
      url: `https://sctapi.ftqq.com/${encodeURIComponent(this.token)}.send`,
      method: 'POST',
      headers: { 'content-type': 'application/x-www-form-urlencoded' },
      body: form.toString(),
    }
  }
}
