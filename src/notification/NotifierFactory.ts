import { Notifier } from './Notifier'
import { ConsoleNotifier } from './ConsoleNotifier'
import { PushPlusNotifier } from './PushPlusNotifier'
import { ServerChanNotifier } from './ServerChanNotifier'
import { BarkNotifier } from './BarkNotifier'
import { PushConfig } from '../contracts'

/**
 * Factory for creating the notifier a push configuration asks for
 */
export class NotifierFactory {
  /**
   * @returns A console notifier when no token is configured
   */
  static createNotifier(config: PushConfig): Notifier {
    const { token, title, timeoutMs } = config
    if (!token) {
      return new ConsoleNotifier()
    }

    switch (config.transport) {
      case 'pushplus':
        return new PushPlusNotifier(token, title, timeoutMs)
      case 'serverchan':
        return new ServerChanNotifier(token, title, timeoutMs)
      case 'bark':
        return new BarkNotifier(token, title, timeoutMs)
    }
  }
}
