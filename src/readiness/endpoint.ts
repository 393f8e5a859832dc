/**
 * 就绪端点描述
 *
 * 支持的写法：
 * - host:port / tcp://host:port  → TCP 连接探测
 * - http(s)://...                → HTTP GET，任意状态码都算可达
 */

import { AppError } from '../shared/error.js'
import { err, ok, type Result } from '../shared/result.js'

export type Endpoint = { kind: 'tcp'; host: string; port: number } | { kind: 'http'; url: string }

function parsePort(raw: string): number | null {
  if (!/^\d+$/.test(raw)) return null
  const port = Number(raw)
  return port >= 1 && port <= 65535 ? port : null
}

export function parseEndpoint(input: string): Result<Endpoint, AppError> {
  const value = input.trim()

  if (/^https?:\/\//i.test(value)) {
    try {
      return ok({ kind: 'http', url: new URL(value).toString() })
    } catch {
      return err(AppError.invalidArgument(`Invalid endpoint URL: ${input}`))
    }
  }

  const hostPort = value.replace(/^tcp:\/\//i, '')
  const separator = hostPort.lastIndexOf(':')
  if (separator <= 0) {
    return err(AppError.invalidArgument(`Endpoint must be host:port or a URL: ${input}`))
  }

  const host = hostPort.slice(0, separator).replace(/^\[(.*)\]$/, '$1')
  const port = parsePort(hostPort.slice(separator + 1))
  if (port === null) {
    return err(AppError.invalidArgument(`Invalid port in endpoint: ${input}`))
  }
  return ok({ kind: 'tcp', host, port })
}

export function describeEndpoint(endpoint: Endpoint): string {
  return endpoint.kind === 'tcp' ? `${endpoint.host}:${endpoint.port}` : endpoint.url
}
