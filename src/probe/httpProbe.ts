/**
 * HTTP(S) 探测
 *
 * 只关心状态码：响应体被丢弃，证书不校验（自签名 / staging 证书场景）
 * 连接失败、超时作为 Result 的 error 返回
 */

import http from 'http'
import https from 'https'
import { err, ok, type Result } from '../shared/result.js'

export interface HttpRequest {
  url: string
  /** 覆盖 Host 头，用于按虚拟主机路由的反向代理 */
  hostHeader?: string
  auth?: { username: string; password: string }
  timeoutMs: number
}

export interface HttpProbe {
  /** 发送 GET 请求，返回状态码 */
  get(request: HttpRequest): Promise<Result<number, Error>>
}

export function createHttpProbe(): HttpProbe {
  return {
    get(request) {
      return new Promise(resolve => {
        let url: URL
        try {
          url = new URL(request.url)
        } catch {
          resolve(err(new Error(`Invalid URL: ${request.url}`)))
          return
        }

        const options: https.RequestOptions = {
          method: 'GET',
          headers: request.hostHeader ? { host: request.hostHeader } : {},
          timeout: request.timeoutMs,
          rejectUnauthorized: false,
        }
        if (request.auth) {
          options.auth = `${request.auth.username}:${request.auth.password}`
        }

        const onResponse = (res: http.IncomingMessage): void => {
          res.resume()
          resolve(ok(res.statusCode ?? 0))
        }

        const req =
          url.protocol === 'https:'
            ? https.request(url, options, onResponse)
            : http.request(url, options, onResponse)

        req.on('timeout', () => {
          req.destroy(new Error(`Request to ${request.url} timed out after ${request.timeoutMs}ms`))
        })
        req.on('error', error => resolve(err(error)))
        req.end()
      })
    },
  }
}
