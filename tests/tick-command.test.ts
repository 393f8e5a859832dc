/**
 * sentinel tick：一次性检查共享文件中的重启记录与 restart 锁
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from 'vitest'
import { rmSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import { runTickCommand, type TickDeps } from '../src/cli/commands/recovery.js'
import { acquirePidLock, getPidLock, releasePidLock } from '../src/scheduler/pidLock.js'
import { AppError } from '../src/shared/error.js'
import { getRecoveryStatePath } from '../src/shared/paths.js'
import { FakeRuntime, captureOutput, createTestConfig, type CapturedOutput } from './helpers/index.js'

type RuntimeFactory = NonNullable<TickDeps['createRuntime']>

const TEST_DIR = join(tmpdir(), `sentinel-tick-test-${Date.now()}`)
const CONTAINER = 'ollama-compose-ollama-1'

let previousDataDir: string | undefined
let output: CapturedOutput

function tickRuntime(accelerator: boolean): { runtime: FakeRuntime; createRuntime: RuntimeFactory } {
  const runtime = new FakeRuntime({ ollama: { id: CONTAINER, exec: () => (accelerator ? 0 : 1) } })
  const createRuntime: RuntimeFactory = async () => ({
    runtime,
    access: { sudo: false, compose: 'plugin', escalated: false },
  })
  return { runtime, createRuntime }
}

beforeAll(() => {
  previousDataDir = process.env.SENTINEL_DATA_DIR
  process.env.SENTINEL_DATA_DIR = TEST_DIR
})

afterAll(() => {
  if (previousDataDir === undefined) {
    delete process.env.SENTINEL_DATA_DIR
  } else {
    process.env.SENTINEL_DATA_DIR = previousDataDir
  }
  rmSync(TEST_DIR, { recursive: true, force: true })
})

beforeEach(() => {
  rmSync(getRecoveryStatePath(), { force: true })
  output = captureOutput()
})

afterEach(() => {
  output.restore()
  releasePidLock('restart')
})

describe('sentinel tick', () => {
  it('should report a working accelerator', async () => {
    const { runtime, createRuntime } = tickRuntime(true)

    expect(await runTickCommand(createTestConfig(), {}, { createRuntime })).toBe(0)
    expect(output.lines).toEqual([`✓ 加速器正常工作 (${CONTAINER})`])
    expect(runtime.restartCount).toBe(0)
  })

  it('should restart once and then respect the cooldown across invocations', async () => {
    const { runtime, createRuntime } = tickRuntime(false)
    const config = createTestConfig()

    expect(await runTickCommand(config, {}, { createRuntime })).toBe(0)
    expect(await runTickCommand(config, {}, { createRuntime })).toBe(0)

    expect(runtime.restartCount).toBe(1)
    expect(output.lines).toEqual([
      '! 加速器未启用，已重启服务组',
      '! 加速器未启用，但仍在重启冷却期内 (10m)，本次未重启',
    ])
  })

  it('should skip when another tick holds the restart lock', async () => {
    const { runtime, createRuntime } = tickRuntime(false)
    expect(acquirePidLock('restart').success).toBe(true)

    expect(await runTickCommand(createTestConfig(), {}, { createRuntime })).toBe(0)
    expect(output.lines).toEqual([`ℹ 另一个检查进程仍在运行 (PID ${process.pid})，跳过本次检查`])
    expect(runtime.execCalls).toEqual([])
  })

  it('should exit 1 and release the lock when the restart fails', async () => {
    const { runtime, createRuntime } = tickRuntime(false)
    runtime.restartFailure = AppError.restartFailed('docker compose restart', 'Cannot connect to the Docker daemon')

    expect(await runTickCommand(createTestConfig(), {}, { createRuntime })).toBe(1)
    expect(output.lines.join('\n')).toContain('代码: RESTART_FAILED')
    expect(getPidLock('restart')).toBeNull()
  })
})
