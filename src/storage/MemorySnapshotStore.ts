import { SnapshotStore } from './SnapshotStore'
import type { Snapshot } from '../contracts'

export class MemorySnapshotStore implements SnapshotStore {
  private snapshot: Snapshot | null = null
  saveCount = 0

  constructor(initial?: Snapshot) {
    this.snapshot = initial ? new Map(initial) : null
  }

  async load(): Promise<Snapshot> {
    return new Map(this.snapshot ?? [])
  }

  async save(snapshot: Snapshot): Promise<void> {
    this.snapshot = new Map(snapshot)
    this.saveCount++
  }

  /** Stored snapshot without copying; null when nothing was stored. */
  peek(): Snapshot | null {
    return this.snapshot
  }
}
