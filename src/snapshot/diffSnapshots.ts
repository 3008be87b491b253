import type { AmountChange, InventoryItem, Snapshot, SnapshotDiff } from '../contracts'

/**
 * Compare two snapshots by asset id.
 * Added and changed entries follow the order of `current`, removed entries the order of `previous`.
 */
export function diffSnapshots(current: Snapshot, previous: Snapshot): SnapshotDiff {
  const added = new Map<string, InventoryItem>()
  const removed = new Map<string, InventoryItem>()
  const changed = new Map<string, AmountChange>()

  for (const [assetId, item] of current) {
    const before = previous.get(assetId)

    if (!before) {
      added.set(assetId, item)
    } else if (before.amount !== item.amount) {
      changed.set(assetId, {
        oldAmount: before.amount,
        newAmount: item.amount,
      })
    }
  }

  for (const [assetId, item] of previous) {
    if (!current.has(assetId)) {
      removed.set(assetId, item)
    }
  }

  return { added, removed, changed }
}

export function isEmptyDiff(diff: SnapshotDiff): boolean {
  return diff.added.size === 0 && diff.removed.size === 0 && diff.changed.size === 0
}

export function countChanges(diff: SnapshotDiff): { added: number; removed: number; changed: number } {
  return {
    added: diff.added.size,
    removed: diff.removed.size,
    changed: diff.changed.size,
  }
}
