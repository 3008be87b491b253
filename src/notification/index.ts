export type { Notifier, PushRequest } from './Notifier'
export { NotifierFactory } from './NotifierFactory'
export { BaseNotifier } from './BaseNotifier'
export { ConsoleNotifier } from './ConsoleNotifier'
export { PushPlusNotifier, PUSHPLUS_URL } from './PushPlusNotifier'
export { ServerChanNotifier } from './ServerChanNotifier'
export { BarkNotifier } from './BarkNotifier'
