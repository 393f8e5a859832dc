/**
 * @entry Recovery 模块 - 存活判定与服务组自动重启
 */

export {
  RecoveryMonitor,
  type RecoveryDecision,
  type RecoveryMonitorOptions,
  type RestartLock,
} from './recoveryMonitor.js'
export { MemoryRestartLedger, FileRestartLedger, type RestartLedger } from './restartLedger.js'
