import { v4 as uuidv4 } from 'uuid'
import type { CycleOutcome, InventoryFetchResult, Snapshot } from '../contracts'
import type { SnapshotStore } from '../storage/SnapshotStore'
import type { Notifier } from '../notification'
import { diffSnapshots, isEmptyDiff, countChanges } from '../snapshot/diffSnapshots'
import { renderReport, formatTimestamp, escapeHtml } from '../formatting'
import { debugLog } from '../debug/debugLog'

export interface InventorySource {
  fetchInventory(accountId: string): Promise<InventoryFetchResult | null>
}

export interface InventoryMonitorDeps {
  accountId: string
  fetcher: InventorySource
  store: SnapshotStore
  notifier: Notifier
  now?: () => Date
}

/**
 * Runs one fetch → diff → notify → persist pass at a time and keeps the
 * previous snapshot between passes.
 */
export class InventoryMonitor {
  private accountId: string
  private fetcher: InventorySource
  private store: SnapshotStore
  private notifier: Notifier
  private now: () => Date
  private previous: Snapshot = new Map()
  private initialized = false

  constructor(deps: InventoryMonitorDeps) {
    this.accountId = deps.accountId
    this.fetcher = deps.fetcher
    this.store = deps.store
    this.notifier = deps.notifier
    this.now = deps.now ?? (() => new Date())
  }

  /** Load the persisted snapshot; called lazily by the first check if skipped. */
  async initialize(): Promise<void> {
    this.previous = await this.store.load()
    this.initialized = true
    debugLog({ event: 'monitor_initialized', previousItemCount: this.previous.size })
  }

  getPreviousSnapshot(): Snapshot {
    return this.previous
  }

  async checkInventory(): Promise<CycleOutcome> {
    if (!this.initialized) {
      await this.initialize()
    }

    const cycleId = uuidv4()
    const timestamp = formatTimestamp(this.now())
    console.log(`[${timestamp}] Checking inventory...`)
    debugLog({ event: 'cycle_start', cycleId, accountId: this.accountId })

    const result = await this.fetcher.fetchInventory(this.accountId)
    if (!result) {
      console.warn('Could not fetch inventory, skipping this check')
      debugLog({ event: 'cycle_skipped', cycleId })
      return { status: 'fetch-failed' }
    }

    const { snapshot: current, descriptions } = result
    const itemCount = current.size
    console.log(`Current inventory item count: ${itemCount}`)

    // An empty previous snapshot also covers a legitimately empty inventory
    if (this.previous.size === 0) {
      console.log('First run, storing the initial inventory')
      await this.store.save(current)
      this.previous = current
      debugLog({ event: 'cycle_baseline', cycleId, itemCount })
      return { status: 'baseline', itemCount }
    }

    const diff = diffSnapshots(current, this.previous)
    if (isEmptyDiff(diff)) {
      console.log('No inventory changes')
      debugLog({ event: 'cycle_unchanged', cycleId, itemCount })
      return { status: 'unchanged', itemCount }
    }

    const counts = countChanges(diff)
    console.log(`Changes found: added ${counts.added}, removed ${counts.removed}, changed ${counts.changed}`)

    const message =
      `<p>Checked at: ${escapeHtml(timestamp)}</p>` + renderReport(diff, this.previous, descriptions)
    const delivered = await this.notifier.notify(message)

    // Persist even when delivery failed; the write is the last step of a cycle
    await this.store.save(current)
    this.previous = current
    console.log('Stored the updated inventory')
    debugLog({ event: 'cycle_changed', cycleId, itemCount, ...counts, delivered })

    return { status: 'changed', itemCount, diff, message, delivered }
  }
}
