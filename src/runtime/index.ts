/**
 * @entry Runtime 容器运行时模块
 *
 * - ContainerRuntime / CommandRunner: 能力接口
 * - execaRunner: 实际执行外部命令
 * - resolveDockerAccess: 启动时一次性探测权限与 compose 方式
 * - createRuntime: 探测 + 构造 DockerCliRuntime
 */

import type { ComposeConfig } from '../config/schema.js'
import { parseInterval } from '../shared/formatTime.js'
import { execaRunner } from './commandRunner.js'
import { resolveDockerAccess } from './dockerAccess.js'
import { DockerCliRuntime } from './dockerRuntime.js'
import type { CommandRunner, ContainerRuntime, DockerAccess } from './types.js'

export type {
  CommandResult,
  CommandOptions,
  CommandRunner,
  ComposeStyle,
  DockerAccess,
  ContainerState,
  ContainerRuntime,
} from './types.js'
export { execaRunner, formatCommand } from './commandRunner.js'
export { resolveDockerAccess } from './dockerAccess.js'
export { DockerCliRuntime } from './dockerRuntime.js'

export async function createRuntime(
  compose: ComposeConfig,
  options: { useSudo: boolean; run?: CommandRunner }
): Promise<{ runtime: ContainerRuntime; access: DockerAccess }> {
  const run = options.run ?? execaRunner
  const access = await resolveDockerAccess(run, { useSudo: options.useSudo })
  const runtime = new DockerCliRuntime({
    access,
    run,
    composeFile: compose.file,
    project: compose.project,
    commandTimeoutMs: parseInterval(compose.commandTimeout),
    restartTimeoutMs: parseInterval(compose.restartTimeout),
  })
  return { runtime, access }
}
