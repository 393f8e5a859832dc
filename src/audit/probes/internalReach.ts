import { parseInterval } from '../../shared/formatTime.js'
import type { ProbeDescriptor } from '../types.js'

export const internalReachProbe: ProbeDescriptor = {
  name: 'internal-reach',
  description: 'Reach the inference service from inside the frontend container network',
  async run({ config, runtime }) {
    const frontend = config.services.frontend
    const containerId = await runtime.findContainer(frontend)
    if (!containerId) {
      return {
        name: this.name,
        outcome: 'warn',
        skipped: true,
        detail: `找不到 ${frontend} 容器，略过内部连线检查`,
      }
    }

    // 前端镜像不一定带 curl，退回 wget
    const url = config.inference.internalUrl
    const target = new URL(url).host
    const result = await runtime.exec(containerId, [
      'sh',
      '-lc',
      `command -v curl >/dev/null 2>&1 && curl -sf ${url} >/dev/null 2>&1 || ` +
        `(command -v wget >/dev/null 2>&1 && wget -qO- ${url} >/dev/null 2>&1)`,
    ], { timeoutMs: parseInterval(config.target.requestTimeout) })
    return result.exitCode === 0
      ? { name: this.name, outcome: 'pass', detail: `${frontend} 容器内可连到 ${target}` }
      : { name: this.name, outcome: 'fail', detail: `${frontend} 容器内无法连到 ${target}` }
  },
}
