/**
 * 数据目录路径
 *
 * 优先级：
 * 1. 环境变量 SENTINEL_DATA_DIR
 * 2. 默认值 ~/.stack-sentinel
 *
 * 目录内只放运行期状态：monitor.pid、recovery-state.json
 */

import { join, isAbsolute } from 'path'
import { homedir } from 'os'

const DEFAULT_DATA_DIR_NAME = '.stack-sentinel'

export function getDataDir(): string {
  const envDir = process.env.SENTINEL_DATA_DIR
  if (envDir) {
    return isAbsolute(envDir) ? envDir : join(process.cwd(), envDir)
  }
  return join(homedir(), DEFAULT_DATA_DIR_NAME)
}

export function getPidFilePath(service: string): string {
  return join(getDataDir(), `${service}.pid`)
}

export function getRecoveryStatePath(): string {
  return join(getDataDir(), 'recovery-state.json')
}
