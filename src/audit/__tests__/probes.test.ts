import { describe, it, expect } from 'vitest'
import { createServiceStateProbe } from '../probes/serviceState.js'
import { proxyPingProbe } from '../probes/proxyPing.js'
import { adminRouteProbe } from '../probes/adminRoute.js'
import { frontendRouteProbe } from '../probes/frontendRoute.js'
import { inferenceRouteProbe } from '../probes/inferenceRoute.js'
import { internalReachProbe } from '../probes/internalReach.js'
import {
  ADMIN_HOST,
  FRONTEND_HOST,
  FakeHttpProbe,
  FakeRuntime,
  connectionRefused,
  createAuditContext,
  createHealthyRuntime,
  createTestConfig,
} from '../../../tests/helpers/index.js'

describe('service state probe', () => {
  const probe = createServiceStateProbe('ollama')

  it('should pass a running container without health check', async () => {
    const runtime = new FakeRuntime({ ollama: { id: 'c1' } })
    const result = await probe.run(createAuditContext({ runtime }))
    expect(result).toEqual({
      name: 'service:ollama',
      outcome: 'pass',
      detail: 'service=ollama running (health=none)',
    })
  })

  it('should warn when running but not healthy', async () => {
    const runtime = new FakeRuntime({ ollama: { id: 'c1', health: 'starting' } })
    const result = await probe.run(createAuditContext({ runtime }))
    expect(result.outcome).toBe('warn')
    expect(result.detail).toBe('service=ollama running (health=starting)')
  })

  it('should fail when the container is not running', async () => {
    const runtime = new FakeRuntime({ ollama: { id: 'c1', status: 'exited' } })
    const result = await probe.run(createAuditContext({ runtime }))
    expect(result.outcome).toBe('fail')
    expect(result.detail).toBe('service=ollama 状态=exited')
  })

  it('should fail when there is no container', async () => {
    const result = await probe.run(createAuditContext({ runtime: new FakeRuntime() }))
    expect(result.outcome).toBe('fail')
    expect(result.detail).toBe('service=ollama 未启动（无容器）')
  })

  it('should fail when the runtime query throws', async () => {
    class DeniedRuntime extends FakeRuntime {
      async findContainer(): Promise<string | null> {
        throw new Error('permission denied')
      }
    }
    const result = await probe.run(createAuditContext({ runtime: new DeniedRuntime() }))
    expect(result.outcome).toBe('fail')
    expect(result.detail).toBe('service=ollama 查询失败: permission denied')
  })
})

describe('proxy ping probe', () => {
  it('should exec the ping inside the proxy container', async () => {
    const runtime = createHealthyRuntime()
    const result = await proxyPingProbe.run(createAuditContext({ runtime }))

    expect(result).toEqual({ name: 'proxy-ping', outcome: 'pass', detail: 'traefik ping 通过' })
    expect(runtime.execCalls).toEqual([
      {
        containerId: 'c-traefik',
        command: [
          'sh',
          '-lc',
          'curl -sf http://localhost:8082/ping >/dev/null 2>&1 || wget -q --spider http://localhost:8082/ping',
        ],
      },
    ])
  })

  it('should fail on a non-zero exit', async () => {
    const runtime = new FakeRuntime({ traefik: { id: 'c-traefik', exec: () => 7 } })
    const result = await proxyPingProbe.run(createAuditContext({ runtime }))
    expect(result.outcome).toBe('fail')
    expect(result.detail).toBe('traefik ping 失败 (exit=7)')
  })

  it('should bound the ping by the request timeout and fail when it expires', async () => {
    const runtime = new FakeRuntime({ traefik: { id: 'c-traefik', exec: () => 'timeout' } })
    const result = await proxyPingProbe.run(createAuditContext({ runtime }))

    expect(runtime.execTimeouts).toEqual([10_000])
    expect(result).toEqual({ name: 'proxy-ping', outcome: 'fail', detail: 'traefik ping 失败 (超时)' })
  })

  it('should skip with a warning when the proxy container is missing', async () => {
    const result = await proxyPingProbe.run(createAuditContext({ runtime: new FakeRuntime() }))
    expect(result).toEqual({
      name: 'proxy-ping',
      outcome: 'warn',
      skipped: true,
      detail: '找不到 traefik 容器，略过 ping 检查',
    })
  })
})

describe('admin route probe', () => {
  it('should request the admin API with the virtual host', async () => {
    const http = new FakeHttpProbe(() => 200)
    const result = await adminRouteProbe.run(createAuditContext({ http, options: { host: '10.0.0.5' } }))

    expect(result).toEqual({ name: 'admin-route', outcome: 'pass', detail: 'Dashboard 路由可用 (200)' })
    expect(http.requests).toEqual([
      {
        url: 'https://10.0.0.5:8443/api/rawdata',
        hostHeader: ADMIN_HOST,
        auth: undefined,
        timeoutMs: 10000,
      },
    ])
  })

  it('should send credentials only when both are given', async () => {
    const http = new FakeHttpProbe(() => 200)
    await adminRouteProbe.run(createAuditContext({ http, options: { dashboardUser: 'admin' } }))
    await adminRouteProbe.run(
      createAuditContext({ http, options: { dashboardUser: 'admin', dashboardPass: 'test-secret' } })
    )

    expect(http.requests[0]?.auth).toBeUndefined()
    expect(http.requests[1]?.auth).toEqual({ username: 'admin', password: 'test-secret' })
  })

  it('should accept 401 as an existing route', async () => {
    const result = await adminRouteProbe.run(createAuditContext({ http: new FakeHttpProbe(() => 401) }))
    expect(result.outcome).toBe('pass')
    expect(result.detail).toBe('Dashboard 路由可用，但需要 BasicAuth (401 预期)')
  })

  it('should report redirects with their code', async () => {
    const result = await adminRouteProbe.run(createAuditContext({ http: new FakeHttpProbe(() => 302) }))
    expect(result.outcome).toBe('pass')
    expect(result.detail).toBe('Dashboard 路由回应 302')
  })

  it('should fail on other codes', async () => {
    const result = await adminRouteProbe.run(createAuditContext({ http: new FakeHttpProbe(() => 404) }))
    expect(result.outcome).toBe('fail')
    expect(result.detail).toBe('Dashboard 路由异常，回应 404')
  })

  it('should fail on connection errors', async () => {
    const http = new FakeHttpProbe(req => connectionRefused(req.url))
    const result = await adminRouteProbe.run(createAuditContext({ http }))
    expect(result.outcome).toBe('fail')
    expect(result.detail).toBe('Dashboard 路由无法连线: connect ECONNREFUSED 127.0.0.1:8443')
  })

  it('should skip without an admin hostname', async () => {
    const http = new FakeHttpProbe()
    const config = createTestConfig({ hostnames: { frontend: FRONTEND_HOST } })
    const result = await adminRouteProbe.run(createAuditContext({ config, http }))

    expect(result).toEqual({
      name: 'admin-route',
      outcome: 'warn',
      skipped: true,
      detail: '未设定 TRAEFIK_HOSTNAME，略过 dashboard 路由检查',
    })
    expect(http.requests).toEqual([])
  })
})

describe('frontend route probe', () => {
  it('should request the frontend root over HTTPS', async () => {
    const http = new FakeHttpProbe(() => 200)
    const result = await frontendRouteProbe.run(createAuditContext({ http }))

    expect(result.detail).toBe('WebUI HTTPS 可用 (code=200)')
    expect(http.requests[0]?.url).toBe('https://127.0.0.1:8443/')
    expect(http.requests[0]?.hostHeader).toBe(FRONTEND_HOST)
  })

  it('should fail on 401', async () => {
    const result = await frontendRouteProbe.run(createAuditContext({ http: new FakeHttpProbe(() => 401) }))
    expect(result.outcome).toBe('fail')
    expect(result.detail).toBe('WebUI HTTPS 异常 (code=401)')
  })

  it('should skip without a frontend hostname', async () => {
    const config = createTestConfig({ hostnames: { admin: ADMIN_HOST } })
    const result = await frontendRouteProbe.run(createAuditContext({ config }))
    expect(result.skipped).toBe(true)
    expect(result.detail).toBe('未设定 OLLAMA_HOSTNAME，略过 WebUI 路由检查')
  })
})

describe('inference route probe', () => {
  it('should request the model list through the HTTP entrypoint', async () => {
    const http = new FakeHttpProbe(() => 200)
    const result = await inferenceRouteProbe.run(createAuditContext({ http }))

    expect(result).toEqual({
      name: 'inference-route',
      outcome: 'pass',
      detail: '推理 API HTTP 可用 (code=200)',
    })
    expect(http.requests[0]?.url).toBe('http://127.0.0.1:8880/api/tags')
    expect(http.requests[0]?.hostHeader).toBeUndefined()
  })

  it('should warn about the allowlist on 403', async () => {
    const result = await inferenceRouteProbe.run(createAuditContext({ http: new FakeHttpProbe(() => 403) }))
    expect(result.outcome).toBe('warn')
    expect(result.detail).toBe('推理 API 回应 403（可能被 IP allowlist 阻挡）。确认来源 IP 是否在白名单内。')
  })

  it('should fail on server errors', async () => {
    const result = await inferenceRouteProbe.run(createAuditContext({ http: new FakeHttpProbe(() => 502) }))
    expect(result.outcome).toBe('fail')
    expect(result.detail).toBe('推理 API HTTP 异常 (code=502)')
  })
})

describe('internal reach probe', () => {
  it('should exec the request inside the frontend container', async () => {
    const runtime = createHealthyRuntime()
    const result = await internalReachProbe.run(createAuditContext({ runtime }))

    expect(result).toEqual({
      name: 'internal-reach',
      outcome: 'pass',
      detail: 'webui 容器内可连到 ollama:11434',
    })
    expect(runtime.execCalls[0]?.containerId).toBe('c-webui')
    expect(runtime.execCalls[0]?.command[2]).toContain('curl -sf http://ollama:11434/api/tags')
    expect(runtime.execCalls[0]?.command[2]).toContain('wget -qO- http://ollama:11434/api/tags')
  })

  it('should fail when the request fails', async () => {
    const runtime = new FakeRuntime({ webui: { id: 'c-webui', exec: () => 1 } })
    const result = await internalReachProbe.run(createAuditContext({ runtime }))
    expect(result.outcome).toBe('fail')
    expect(result.detail).toBe('webui 容器内无法连到 ollama:11434')
  })

  it('should bound the request by the request timeout', async () => {
    const runtime = new FakeRuntime({ webui: { id: 'c-webui', exec: () => 'timeout' } })
    const config = createTestConfig({ target: { ...createTestConfig().target, requestTimeout: '4s' } })

    const result = await internalReachProbe.run(createAuditContext({ runtime, config }))

    expect(runtime.execTimeouts).toEqual([4000])
    expect(result.outcome).toBe('fail')
  })

  it('should skip when the frontend container is missing', async () => {
    const result = await internalReachProbe.run(createAuditContext({ runtime: new FakeRuntime() }))
    expect(result.outcome).toBe('warn')
    expect(result.skipped).toBe(true)
    expect(result.detail).toBe('找不到 webui 容器，略过内部连线检查')
  })
})
