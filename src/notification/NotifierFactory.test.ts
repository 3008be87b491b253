import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { NotifierFactory } from './NotifierFactory'
import { ConsoleNotifier } from './ConsoleNotifier'
import { PushPlusNotifier, PUSHPLUS_URL } from './PushPlusNotifier'
import { ServerChanNotifier } from './ServerChanNotifier'
import { BarkNotifier } from './BarkNotifier'
import type { PushConfig } from '../contracts'

const REPORT = '<h3>🎁 Added items (1):</h3><ul><li>AK-47 x1</li></ul>'
const REPORT_TEXT = '🎁 Added items (1):\n  • AK-47 x1'

describe('NotifierFactory', () => {
  const base: PushConfig = {
    transport: 'pushplus',
    title: 'Inventory changed',
    timeoutMs: 1000,
  }

  it('should fall back to the console without a token', () => {
    expect(NotifierFactory.createNotifier(base)).toBeInstanceOf(ConsoleNotifier)
  })

  it('should create the configured transport', () => {
    const token = 'test-token'
    expect(NotifierFactory.createNotifier({ ...base, token })).toBeInstanceOf(PushPlusNotifier)
    expect(NotifierFactory.createNotifier({ ...base, token, transport: 'serverchan' })).toBeInstanceOf(ServerChanNotifier)
    expect(NotifierFactory.createNotifier({ ...base, token, transport: 'bark' })).toBeInstanceOf(BarkNotifier)
  })
})

describe('push transports', () => {
  const fetchMock = vi.fn<typeof fetch>()

  beforeEach(() => {
    vi.stubGlobal('fetch', fetchMock)
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    fetchMock.mockImplementation(async () => new Response('{"code":200}', { status: 200 }))
  })

  afterEach(() => {
    fetchMock.mockReset()
    vi.unstubAllGlobals()
    vi.restoreAllMocks()
  })

  const sentRequest = (): [string, RequestInit] => {
    const call = fetchMock.mock.calls[0]
    expect(call).toBeDefined()
    const [url, init] = call
    return [String(url), init ?? {}]
  }

  it('should post HTML as JSON to PushPlus', async () => {
    const notifier = new PushPlusNotifier('test-token', 'Inventory changed', 1000)

    expect(await notifier.notify(REPORT)).toBe(true)

    const [url, init] = sentRequest()
    expect(url).toBe(PUSHPLUS_URL)
    expect(init.method).toBe('POST')
    expect(init.headers).toEqual({ 'content-type': 'application/json' })
    expect(JSON.parse(String(init.body))).toEqual({
      token: 'test-token',
      title: 'Inventory changed',
      content: REPORT,
      template: 'html',
    })
  })

  it('should post plain text as a form to ServerChan', async () => {
    const notifier = new ServerChanNotifier('test-token', 'Inventory changed', 1000)

    expect(await notifier.notify(REPORT)).toBe(true)

    const [url, init] = sentRequest()
    expect(url).toBe('https://sctapi.ftqq.com/test-token.send')
    expect(init.method).toBe('POST')
    const form = new URLSearchParams(String(init.body))
    expect(form.get('title')).toBe('Inventory changed')
    expect(form.get('desp')).toBe(REPORT_TEXT)
  })

  it('should put title and plain text in the Bark URL', async () => {
    const notifier = new BarkNotifier('test-token', 'Inventory changed', 1000)

    expect(await notifier.notify(REPORT)).toBe(true)

    const [url, init] = sentRequest()
    expect(url).toBe(
      `https://api.day.app/test-token/Inventory%20changed/${encodeURIComponent(REPORT_TEXT)}`
    )
    expect(init.method).toBe('GET')
    expect(init.body).toBeUndefined()
  })

  it('should report a non-success response as not delivered', async () => {
    fetchMock.mockImplementation(async () => new Response('token invalid', { status: 403 }))
    const notifier = new PushPlusNotifier('test-token', 'Inventory changed', 1000)

    expect(await notifier.notify(REPORT)).toBe(false)
    expect(console.warn).toHaveBeenCalledWith('pushplus notification failed with status 403: token invalid')
  })

  it('should report a transport error as not delivered', async () => {
    fetchMock.mockRejectedValue(new Error('timeout'))
    const notifier = new BarkNotifier('test-token', 'Inventory changed', 1000)

    expect(await notifier.notify(REPORT)).toBe(false)
    expect(console.warn).toHaveBeenCalledWith('bark notification error: timeout')
  })

  it('should bound the push request with the configured timeout', async () => {
    const timeoutSpy = vi.spyOn(AbortSignal, 'timeout')
    const notifier = new ServerChanNotifier('test-token', 'Inventory changed', 1000)

    await notifier.notify(REPORT)

    expect(timeoutSpy).toHaveBeenCalledWith(1000)
    const [, init] = sentRequest()
    expect(init.signal).toBeInstanceOf(AbortSignal)
  })

  it('should report a timed-out push as not delivered', async () => {
    fetchMock.mockRejectedValue(new DOMException('The operation was aborted due to timeout', 'TimeoutError'))
    const notifier = new PushPlusNotifier('test-token', 'Inventory changed', 1000)

    expect(await notifier.notify(REPORT)).toBe(false)
    expect(console.warn).toHaveBeenCalledTimes(1)
  })

  it('should print plain text on the console', async () => {
    const notifier = new ConsoleNotifier()

    expect(await notifier.notify(REPORT)).toBe(true)
    expect(console.log).toHaveBeenLastCalledWith(REPORT_TEXT)
    expect(fetchMock).not.toHaveBeenCalled()
  })
})
