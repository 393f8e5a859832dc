/**
 * Readiness Gate
 *
 * 反复尝试连接端点直到成功或超时。两次尝试之间固定间隔 pollInterval，
 * 最后一次等待会被截断到截止时间，总耗时不超过 timeout + 单次尝试超时。
 */

import { WaitTimeoutError } from '../shared/error.js'
import { err, map, ok, type Result } from '../shared/result.js'
import { createHttpProbe } from '../probe/httpProbe.js'
import { probeTcp } from '../probe/tcpProbe.js'
import { describeEndpoint, type Endpoint } from './endpoint.js'

export interface WaitOptions {
  timeoutMs: number
  pollIntervalMs: number
  /** 单次连接尝试的超时 */
  attemptTimeoutMs: number
}

export interface WaitSuccess {
  attempts: number
  elapsedMs: number
}

export type ReadinessAttempt = (endpoint: Endpoint, timeoutMs: number) => Promise<Result<void, Error>>

export interface WaitDeps {
  attempt?: ReadinessAttempt
  sleep?: (ms: number) => Promise<void>
  now?: () => number
  /** 每次失败尝试后回调（CLI 用来刷新 spinner） */
  onRetry?: (attempt: number, error: Error) => void
}

const httpProbe = createHttpProbe()

export const defaultAttempt: ReadinessAttempt = async (endpoint, timeoutMs) => {
  if (endpoint.kind === 'tcp') {
    return probeTcp(endpoint.host, endpoint.port, timeoutMs)
  }
  const response = await httpProbe.get({ url: endpoint.url, timeoutMs })
  return map(response, () => undefined)
}

const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms))

export async function waitReady(
  endpoint: Endpoint,
  options: WaitOptions,
  deps: WaitDeps = {}
): Promise<Result<WaitSuccess, WaitTimeoutError>> {
  const attempt = deps.attempt ?? defaultAttempt
  const sleep = deps.sleep ?? defaultSleep
  const now = deps.now ?? Date.now

  const startedAt = now()
  let attempts = 0
  let lastError: Error | undefined

  for (;;) {
    attempts++
    const result = await attempt(endpoint, options.attemptTimeoutMs)
    if (result.ok) {
      return ok({ attempts, elapsedMs: now() - startedAt })
    }

    lastError = result.error
    deps.onRetry?.(attempts, result.error)

    const elapsedMs = now() - startedAt
    const remainingMs = options.timeoutMs - elapsedMs
    if (remainingMs <= 0) {
      return err(new WaitTimeoutError(describeEndpoint(endpoint), elapsedMs, attempts, lastError))
    }
    await sleep(Math.min(options.pollIntervalMs, remainingMs))
  }
}
