import { Notifier } from './Notifier'
import { stripMarkup } from '../formatting'

/**
 * Used when no push token is configured
 */
export class ConsoleNotifier implements Notifier {
  readonly name = 'console'

  async notify(message: string): Promise<boolean> {
    console.log('No push token configured, printing the report instead')
    console.log(stripMarkup(message))
    return true
  }
}
