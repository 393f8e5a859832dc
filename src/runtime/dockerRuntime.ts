/**
 * 基于 docker / docker compose CLI 的 ContainerRuntime 实现
 */

import { AppError } from '../shared/error.js'
import { formatCommand } from './commandRunner.js'
import type {
  CommandOptions,
  CommandResult,
  CommandRunner,
  ContainerRuntime,
  ContainerState,
  DockerAccess,
} from './types.js'

const INSPECT_FORMAT =
  '{{.State.Status}}|{{if .State.Health}}{{.State.Health.Status}}{{else}}none{{end}}'

export interface DockerRuntimeOptions {
  access: DockerAccess
  run: CommandRunner
  /** compose 文件路径（-f） */
  composeFile?: string
  /** compose 项目名（-p） */
  project?: string
  /** ps / inspect / exec 的默认超时 */
  commandTimeoutMs?: number
  /** restart 的超时 */
  restartTimeoutMs?: number
}

export class DockerCliRuntime implements ContainerRuntime {
  private readonly access: DockerAccess
  private readonly run: CommandRunner
  private readonly composeFile?: string
  private readonly project?: string
  private readonly commandTimeoutMs?: number
  private readonly restartTimeoutMs?: number

  constructor(options: DockerRuntimeOptions) {
    this.access = options.access
    this.run = options.run
    this.composeFile = options.composeFile
    this.project = options.project
    this.commandTimeoutMs = options.commandTimeoutMs
    this.restartTimeoutMs = options.restartTimeoutMs
  }

  async findContainer(service: string): Promise<string | null> {
    const result = await this.compose(['ps', '-q', service])
    if (result.exitCode !== 0) {
      throw new Error(`${result.command} failed: ${result.stderr.trim() || `exit ${result.exitCode}`}`)
    }
    const id = result.stdout
      .split('\n')
      .map(line => line.trim())
      .find(line => line.length > 0)
    return id ?? null
  }

  async inspect(containerId: string): Promise<ContainerState> {
    const result = await this.docker(['inspect', '-f', INSPECT_FORMAT, containerId])
    if (result.exitCode !== 0) {
      throw new Error(`${result.command} failed: ${result.stderr.trim() || `exit ${result.exitCode}`}`)
    }
    const [status = 'unknown', health = 'unknown'] = result.stdout.trim().split('|')
    return { status, health }
  }

  exec(containerId: string, command: string[], options: CommandOptions = {}): Promise<CommandResult> {
    return this.docker(['exec', containerId, ...command], options.timeoutMs)
  }

  async restartGroup(): Promise<CommandResult> {
    const result = await this.compose(['restart'], this.restartTimeoutMs)
    if (result.exitCode !== 0) {
      throw AppError.restartFailed(result.command, result.stderr.trim() || `exit ${result.exitCode}`)
    }
    return result
  }

  describeRestart(): string {
    const [file, args] = this.composeInvocation(['restart'])
    return formatCommand(file, args)
  }

  private docker(args: string[], timeoutMs = this.commandTimeoutMs): Promise<CommandResult> {
    const options = { timeoutMs }
    return this.access.sudo ? this.run('sudo', ['docker', ...args], options) : this.run('docker', args, options)
  }

  private compose(args: string[], timeoutMs = this.commandTimeoutMs): Promise<CommandResult> {
    const [file, fullArgs] = this.composeInvocation(args)
    return this.run(file, fullArgs, { timeoutMs })
  }

  private composeInvocation(args: string[]): [string, string[]] {
    const scoped = [
      ...(this.composeFile ? ['-f', this.composeFile] : []),
      ...(this.project ? ['-p', this.project] : []),
      ...args,
    ]
    const base: [string, string[]] =
      this.access.compose === 'plugin' ? ['docker', ['compose', ...scoped]] : ['docker-compose', scoped]
    return this.access.sudo ? ['sudo', [base[0], ...base[1]]] : base
  }
}
