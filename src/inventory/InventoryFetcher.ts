import {
  Descriptions,
  FetchConfig,
  InventoryFetchResult,
  InventoryResponseSchema,
  Snapshot,
} from '../contracts'
import { debugLog, errorMessage } from '../debug/debugLog'

export const DEFAULT_APP_ID = 730
export const DEFAULT_CONTEXT_ID = 2

export interface InventoryFetcherOptions extends FetchConfig {
  appId?: number
  contextId?: number
}

/**
 * Reads the public inventory of one account.
 * Returns null on any failure so callers can tell "no data" from an empty inventory.
 */
export class InventoryFetcher {
  private appId: number
  private contextId: number

  constructor(private options: InventoryFetcherOptions) {
    this.appId = options.appId ?? DEFAULT_APP_ID
    this.contextId = options.contextId ?? DEFAULT_CONTEXT_ID
  }

  buildUrl(accountId: string): string {
    return `https://${this.options.host}/inventory/${encodeURIComponent(accountId)}/${this.appId}/${this.contextId}`
  }

  async fetchInventory(accountId: string): Promise<InventoryFetchResult | null> {
    const url = this.buildUrl(accountId)

    let body: unknown
    try {
      const response = await fetch(url, {
        headers: { 'user-agent': this.options.userAgent },
        signal: AbortSignal.timeout(this.options.timeoutMs),
      })

      if (response.status !== 200) {
        console.warn(`Inventory request failed with status ${response.status}`)
        debugLog({ event: 'inventory_fetch_status', url, status: response.status })
        return null
      }

      body = await response.json()
    } catch (error) {
      console.warn(`Inventory request error: ${errorMessage(error)}`)
      debugLog({ event: 'inventory_fetch_error', url, error: errorMessage(error) })
      return null
    }

    const parsed = InventoryResponseSchema.safeParse(body)
    if (!parsed.success) {
      console.warn('Inventory response has no usable asset list')
      debugLog({
        event: 'inventory_response_invalid',
        url,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      })
      return null
    }

    const snapshot: Snapshot = new Map()
    for (const asset of parsed.data.assets) {
      snapshot.set(asset.assetid, {
        classid: asset.classid,
        amount: asset.amount,
        instanceid: asset.instanceid ?? '0',
      })
    }

    const descriptions: Descriptions = new Map()
    for (const description of parsed.data.descriptions ?? []) {
      descriptions.set(`${description.classid}_${description.instanceid}`, description)
    }

    debugLog({
      event: 'inventory_fetched',
      url,
      assetCount: snapshot.size,
      descriptionCount: descriptions.size,
    })

    return { snapshot, descriptions }
  }
}
