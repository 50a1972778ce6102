/**
 * Monitoring components exports
 */

export { classify, ClassifyOptions } from './state-classifier';
export { createCheckRecord, CheckRecordInput } from './check-record';
export {
  PingProber,
  Prober,
  PingProberOptions,
  PingCommandOutput,
  PingCommandRunner,
  spawnPingCommand,
  DEFAULT_PROBE_TIMEOUT_MS
} from './ping-prober';
export { TickScheduler, TickTask, SchedulerOptions, SchedulerStatus } from './scheduler';
export { ConnectivityMonitor, ConnectivityMonitorOptions } from './connectivity-monitor';
