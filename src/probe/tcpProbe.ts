/**
 * TCP 端口探测：能否建立连接
 */

import net from 'net'
import { err, ok, type Result } from '../shared/result.js'

export function probeTcp(host: string, port: number, timeoutMs: number): Promise<Result<void, Error>> {
  return new Promise(resolve => {
    const socket = new net.Socket()
    socket.setTimeout(timeoutMs)
    socket.once('connect', () => {
      socket.destroy()
      resolve(ok(undefined))
    })
    socket.once('error', error => {
      socket.destroy()
      resolve(err(error))
    })
    socket.once('timeout', () => {
      socket.destroy()
      resolve(err(new Error(`Connection to ${host}:${port} timed out after ${timeoutMs}ms`)))
    })
    socket.connect(port, host)
  })
}
