export interface InventoryItem {
  classid: string
  amount: string
  instanceid: string
}

/** Asset id → item, in the order the endpoint listed the assets. */
export type Snapshot = Map<string, InventoryItem>

export interface ItemDescription {
  classid: string
  instanceid: string
  market_hash_name?: string
  name?: string
  type?: string
}

/** Keyed by `classid_instanceid`. */
export type Descriptions = Map<string, ItemDescription>

export interface InventoryFetchResult {
  snapshot: Snapshot
  descriptions: Descriptions
}

export interface AmountChange {
  oldAmount: string
  newAmount: string
}

export interface SnapshotDiff {
  added: Map<string, InventoryItem>
  removed: Map<string, InventoryItem>
  changed: Map<string, AmountChange>
}

export type PushTransport = 'pushplus' | 'serverchan' | 'bark'

export interface FetchConfig {
  host: string
  userAgent: string
  timeoutMs: number
}

export interface PushConfig {
  transport: PushTransport
  token?: string
  title: string
  timeoutMs: number
}

export interface MonitorConfig {
  accountId: string
  appId: number
  contextId: number
  dataFile: string
  intervalSeconds: number
  fetch: FetchConfig
  push: PushConfig
}

export type CycleOutcome =
  | { status: 'fetch-failed' }
  | { status: 'baseline'; itemCount: number }
  | { status: 'unchanged'; itemCount: number }
  | {
      status: 'changed'
      itemCount: number
      diff: SnapshotDiff
      message: string
      delivered: boolean
    }
