/**
 * 基于 execa 的命令执行器
 * 非零退出码与超时作为结果返回而不是抛出，由调用方决定如何分类
 */

import { execa, ExecaError } from 'execa'
import { fromPromise } from '../shared/result.js'
import type { CommandRunner } from './types.js'

export function formatCommand(file: string, args: string[]): string {
  return [file, ...args].join(' ')
}

export const execaRunner: CommandRunner = async (file, args, options = {}) => {
  const command = formatCommand(file, args)
  const result = await fromPromise(
    execa(file, args, {
      timeout: options.timeoutMs,
      stdin: 'ignore',
    })
  )
  if (result.ok) {
    return { command, exitCode: 0, stdout: result.value.stdout, stderr: result.value.stderr }
  }

  const error = result.error
  if (!(error instanceof ExecaError)) throw error
  return {
    command,
    // 被信号终止（含超时）时没有退出码
    exitCode: error.exitCode ?? -1,
    stdout: typeof error.stdout === 'string' ? error.stdout : '',
    stderr: typeof error.stderr === 'string' && error.stderr ? error.stderr : error.shortMessage,
    timedOut: error.timedOut,
  }
}
