/**
 * 容器运行时能力接口
 *
 * 审计与恢复逻辑只依赖这里的窄接口，测试用内存 fake 替换
 */

/** 一次外部命令的执行结果（非零退出码不视为异常） */
export interface CommandResult {
  /** 完整命令行，用于日志与错误上下文 */
  command: string
  /** 进程退出码；进程未能启动（如命令不存在）时为 -1 */
  exitCode: number
  stdout: string
  stderr: string
  /** 因超时被终止 */
  timedOut?: boolean
}

export interface CommandOptions {
  /** 超时后终止进程，结果按失败返回 */
  timeoutMs?: number
}

export type CommandRunner = (
  file: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>

/** docker compose 的调用方式：插件（docker compose）或独立二进制（docker-compose） */
export type ComposeStyle = 'plugin' | 'standalone'

export interface DockerAccess {
  /** 是否通过 sudo 调用 docker */
  sudo: boolean
  compose: ComposeStyle
  /** 未指定 --use-sudo 但探测后自动改用 sudo */
  escalated: boolean
}

export interface ContainerState {
  /** docker inspect 的 .State.Status，如 running / exited / restarting */
  status: string
  /** .State.Health.Status；未配置 healthcheck 时为 none */
  health: string
}

export interface ContainerRuntime {
  /** 按 compose 服务名查找容器 ID，服务未启动时返回 null */
  findContainer(service: string): Promise<string | null>
  inspect(containerId: string): Promise<ContainerState>
  /** 在容器的命名空间内执行命令，未指定超时时使用运行时的默认命令超时 */
  exec(containerId: string, command: string[], options?: CommandOptions): Promise<CommandResult>
  /** 重启整个服务组，失败时抛出 AppError(RESTART_FAILED) */
  restartGroup(): Promise<CommandResult>
  /** 重启命令的可读形式，用于日志 */
  describeRestart(): string
}
