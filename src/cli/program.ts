/**
 * 命令注册与退出码映射
 */

import { Command, CommanderError } from 'commander'
import { registerCheckCommand } from './commands/check.js'
import { registerWaitCommand } from './commands/wait.js'
import { registerPullCommand } from './commands/pull.js'
import { registerRecoveryCommands } from './commands/recovery.js'
import { setLogLevel } from '../shared/logger.js'
import { AppError } from '../shared/error.js'

/**
 * 异常到退出码的映射：参数错误 2，其余 1
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof CommanderError) {
    // --help / --version 的 exitCode 为 0
    return error.exitCode === 0 ? 0 : 2
  }
  if (error instanceof AppError && error.code === 'INVALID_ARGUMENT') return 2
  return 1
}

export function createProgram(): Command {
  const program = new Command()

  program
    .name('sentinel')
    .description('部署健康检查与加速器自动恢复')
    .version('0.1.0')
    .option('-v, --verbose', '输出调试日志')
    .hook('preAction', thisCommand => {
      if (thisCommand.opts().verbose) {
        setLogLevel('debug')
      }
    })

  // 参数错误不直接 process.exit，统一在入口映射退出码
  program.exitOverride()

  registerCheckCommand(program)
  registerWaitCommand(program)
  registerPullCommand(program)
  registerRecoveryCommands(program)

  return program
}
