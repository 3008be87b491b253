export * from './contracts'
export { diffSnapshots, isEmptyDiff, countChanges } from './snapshot/diffSnapshots'
export * from './formatting'
export type { SnapshotStore } from './storage/SnapshotStore'
export { FileSnapshotStore } from './storage/FileSnapshotStore'
export { MemorySnapshotStore } from './storage/MemorySnapshotStore'
export { InventoryFetcher, DEFAULT_APP_ID, DEFAULT_CONTEXT_ID } from './inventory/InventoryFetcher'
export type { InventoryFetcherOptions } from './inventory/InventoryFetcher'
export * from './notification'
export * from './monitor'
export { ConfigLoader, ConfigurationError } from './config/ConfigLoader'
export type { ConfigOverrides } from './config/ConfigLoader'
