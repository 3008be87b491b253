import type { InventoryItem, Snapshot } from '../contracts'

export interface SnapshotStore {
  /** Last persisted snapshot; empty when none exists or it cannot be read. */
  load(): Promise<Snapshot>
  save(snapshot: Snapshot): Promise<void>
}

export function toSerializable(snapshot: Snapshot): Record<string, InventoryItem> {
  return Object.fromEntries(snapshot)
}

export function fromSerializable(data: Record<string, InventoryItem>): Snapshot {
  return new Map(Object.entries(data))
}
