/**
 * @entry Scheduler 调度模块
 *
 * - PID 锁: acquirePidLock/releasePidLock/isLockHeld（monitor 单实例、tick 防重叠）
 * - 常驻监控: startMonitor/runMonitor（node-cron 定期 tick）
 */

export {
  type LockName,
  type PidLockInfo,
  getPidLock,
  acquirePidLock,
  releasePidLock,
  isLockHeld,
  isProcessRunning,
} from './pidLock.js'

export { type MonitorHandle, createMonitor, startMonitor, runMonitor } from './startMonitor.js'
