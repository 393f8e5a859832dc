#!/usr/bin/env node
/**
 * @entry Stack Sentinel CLI 主入口
 *
 * 核心命令：
 *   sentinel                  - 同 sentinel check
 *   sentinel check            - 检查服务状态、路由与内部连线
 *   sentinel wait [endpoint]  - 等待端点可连线
 *   sentinel pull [models...] - 推理服务就绪后拉取模型
 *
 * 自动恢复：
 *   sentinel tick             - 单次加速器检查（系统 cron 调用）
 *   sentinel monitor          - 前台常驻，定期检查
 *
 * 退出码：0 正常，1 检查失败/运行时错误，2 参数错误
 */

import { CommanderError } from 'commander'
import { printError } from '../shared/error.js'
import { createProgram, exitCodeFor } from './program.js'

async function main(): Promise<void> {
  try {
    await createProgram().parseAsync()
  } catch (error) {
    // commander 已经输出过自己的错误提示
    if (!(error instanceof CommanderError)) {
      printError(error)
    }
    process.exitCode = exitCodeFor(error)
  }
}

await main()
