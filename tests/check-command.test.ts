/**
 * sentinel check 端到端场景
 * 通过注入的运行时与 HTTP 探测驱动完整审计，断言逐行输出与退出码
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { runCheckCommand, type CheckDeps } from '../src/cli/commands/check.js'
import type { DockerAccess } from '../src/runtime/types.js'
import { AppError } from '../src/shared/error.js'
import {
  ADMIN_HOST,
  FRONTEND_HOST,
  FakeHttpProbe,
  FakeRuntime,
  captureOutput,
  connectionRefused,
  createHealthyRuntime,
  createTestConfig,
  type CapturedOutput,
} from './helpers/index.js'

type RuntimeFactory = NonNullable<CheckDeps['createRuntime']>

const directAccess: DockerAccess = { sudo: false, compose: 'plugin', escalated: false }

function runtimeDeps(runtime: FakeRuntime, access: DockerAccess = directAccess) {
  const calls: Array<{ useSudo: boolean }> = []
  const createRuntime: RuntimeFactory = async (_compose, options) => {
    calls.push(options)
    return { runtime, access }
  }
  return { createRuntime, calls }
}

let output: CapturedOutput

beforeEach(() => {
  output = captureOutput()
})

afterEach(() => {
  output.restore()
})

describe('sentinel check', () => {
  it('scenario 1: all services healthy with credentials → every probe passes', async () => {
    const http = new FakeHttpProbe(() => 200)
    const { createRuntime } = runtimeDeps(createHealthyRuntime())

    const code = await runCheckCommand(
      createTestConfig(),
      { dashboardUser: 'admin', dashboardPass: 'test-secret' },
      { createRuntime, http }
    )

    expect(code).toBe(0)
    expect(output.lines).toEqual([
      'ℹ 使用主机: 127.0.0.1',
      `ℹ TRAEFIK_HOSTNAME=${ADMIN_HOST}`,
      `ℹ OLLAMA_HOSTNAME=${FRONTEND_HOST}`,
      '✓ service=traefik running (health=none)',
      '✓ service=ollama running (health=healthy)',
      '✓ service=webui running (health=healthy)',
      '✓ traefik ping 通过',
      '✓ Dashboard 路由可用 (200)',
      '✓ WebUI HTTPS 可用 (code=200)',
      '✓ 推理 API HTTP 可用 (code=200)',
      '✓ webui 容器内可连到 ollama:11434',
      '✓ 所有基本检查完成',
    ])
    expect(http.requests[0]?.auth).toEqual({ username: 'admin', password: 'test-secret' })
  })

  it('scenario 2: inference container absent → its state and dependent probes fail', async () => {
    const runtime = createHealthyRuntime()
    runtime.setService('ollama', null)
    runtime.setService('webui', { id: 'c-webui', health: 'healthy', exec: () => 1 })
    const http = new FakeHttpProbe(req => (req.url.includes(':8880/') ? connectionRefused(req.url) : 200))
    const { createRuntime } = runtimeDeps(runtime)

    const code = await runCheckCommand(createTestConfig(), {}, { createRuntime, http })

    expect(code).toBe(1)
    expect(output.lines).toContain('✗ service=ollama 未启动（无容器）')
    expect(output.lines).toContain('✗ 推理 API HTTP 无法连线: connect ECONNREFUSED 127.0.0.1:8880')
    expect(output.lines).toContain('✗ webui 容器内无法连到 ollama:11434')
    expect(output.lines.at(-1)).toBe('✗ 基本检查有 3 项失败')
  })

  it('scenario 3: inference API answers 403 → allowlist warning, no failure', async () => {
    const http = new FakeHttpProbe(req => (req.url.includes(':8880/') ? 403 : 200))
    const { createRuntime } = runtimeDeps(createHealthyRuntime())

    const code = await runCheckCommand(createTestConfig(), {}, { createRuntime, http })

    expect(code).toBe(0)
    expect(output.lines[9]).toBe('! 推理 API 回应 403（可能被 IP allowlist 阻挡）。确认来源 IP 是否在白名单内。')
    expect(output.lines.at(-1)).toBe('✓ 所有基本检查完成')
  })

  it('scenario 4: admin hostname unset → dashboard check skipped with a warning', async () => {
    const http = new FakeHttpProbe(() => 200)
    const { createRuntime } = runtimeDeps(createHealthyRuntime())
    const config = createTestConfig({ hostnames: { frontend: FRONTEND_HOST } })

    const code = await runCheckCommand(config, {}, { createRuntime, http })

    expect(code).toBe(0)
    expect(output.lines.slice(0, 2)).toEqual(['ℹ 使用主机: 127.0.0.1', `ℹ OLLAMA_HOSTNAME=${FRONTEND_HOST}`])
    expect(output.lines).toContain('! 未设定 TRAEFIK_HOSTNAME，略过 dashboard 路由检查')
    expect(http.requests.map(r => r.hostHeader)).toEqual([FRONTEND_HOST, undefined])
    expect(output.lines.at(-1)).toBe('✓ 所有基本检查完成')
  })

  it('should exclude the internal probe from the tallies with --skip-internal', async () => {
    const runtime = createHealthyRuntime()
    runtime.setService('webui', { id: 'c-webui', exec: () => 1 })
    const { createRuntime } = runtimeDeps(runtime)

    const code = await runCheckCommand(
      createTestConfig(),
      { skipInternal: true },
      { createRuntime, http: new FakeHttpProbe(() => 200) }
    )

    expect(code).toBe(0)
    expect(output.lines.slice(-2)).toEqual(['ℹ 已跳过内部连线检查 (--skip-internal)', '✓ 所有基本检查完成'])
    expect(runtime.execCalls.map(c => c.containerId)).toEqual(['c-traefik'])
  })

  it('should probe the host given on the command line', async () => {
    const http = new FakeHttpProbe(() => 200)
    const { createRuntime } = runtimeDeps(createHealthyRuntime())

    await runCheckCommand(createTestConfig(), { host: '10.0.0.5' }, { createRuntime, http })

    expect(output.lines[0]).toBe('ℹ 使用主机: 10.0.0.5')
    expect(http.requests.map(r => r.url)).toEqual([
      'https://10.0.0.5:8443/api/rawdata',
      'https://10.0.0.5:8443/',
      'http://10.0.0.5:8880/api/tags',
    ])
  })

  it('should warn when docker access had to be escalated to sudo', async () => {
    const { createRuntime, calls } = runtimeDeps(createHealthyRuntime(), {
      sudo: true,
      compose: 'plugin',
      escalated: true,
    })

    await runCheckCommand(createTestConfig(), {}, { createRuntime, http: new FakeHttpProbe(() => 200) })

    expect(calls).toEqual([{ useSudo: false }])
    expect(output.lines[3]).toBe(
      '! 检测到 Docker 权限不足，将改用 sudo 执行。可改用 --use-sudo，或将用户加入 docker 群组后重新登录。'
    )
  })

  it('should pass --use-sudo through to runtime resolution', async () => {
    const { createRuntime, calls } = runtimeDeps(createHealthyRuntime())

    await runCheckCommand(
      createTestConfig(),
      { useSudo: true },
      { createRuntime, http: new FakeHttpProbe(() => 200) }
    )

    expect(calls).toEqual([{ useSudo: true }])
  })

  it('should stop with exit 1 when the container runtime is unreachable', async () => {
    const http = new FakeHttpProbe(() => 200)
    const createRuntime: RuntimeFactory = async () => {
      throw AppError.runtimeUnreachable()
    }

    const code = await runCheckCommand(createTestConfig(), {}, { createRuntime, http })

    expect(code).toBe(1)
    expect(output.lines.at(-1)).toBe(
      '✗ 无法连线到 Docker daemon（可能是权限不足或 Docker 未启动）。启动 Docker、使用 --use-sudo，或将用户加入 docker 群组后重新登录'
    )
    expect(http.requests).toEqual([])
  })
})
