export { InventoryMonitor } from './InventoryMonitor'
export type { InventoryMonitorDeps, InventorySource } from './InventoryMonitor'
export { runMonitor, sleep, EXIT_OK, EXIT_ERROR, EXIT_FETCH_FAILED } from './runMonitor'
export type { RunPolicy, RunOptions, CheckCycle } from './runMonitor'
