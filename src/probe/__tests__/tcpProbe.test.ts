import { describe, it, expect, beforeAll, afterAll } from 'vitest'
import net from 'net'
import { probeTcp } from '../tcpProbe.js'
import { closeServer, findClosedPort, listenOnEphemeralPort } from '../../../tests/helpers/index.js'

const server = net.createServer(socket => socket.end())
let port = 0

beforeAll(async () => {
  port = await listenOnEphemeralPort(server)
})

afterAll(async () => {
  await closeServer(server)
})

describe('probeTcp', () => {
  it('should succeed when something is listening', async () => {
    const result = await probeTcp('127.0.0.1', port, 2000)
    expect(result).toEqual({ ok: true, value: undefined })
  })

  it('should fail on a closed port', async () => {
    const closedPort = await findClosedPort(net.createServer())

    const result = await probeTcp('127.0.0.1', closedPort, 2000)
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.message).toContain('ECONNREFUSED')
    }
  })
})
