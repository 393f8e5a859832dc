import { parseInterval } from '../../shared/formatTime.js'
import type { ProbeDescriptor } from '../types.js'

export const proxyPingProbe: ProbeDescriptor = {
  name: 'proxy-ping',
  description: 'Request the proxy health endpoint from inside the proxy container',
  async run({ config, runtime }) {
    const service = config.services.proxy
    const containerId = await runtime.findContainer(service)
    if (!containerId) {
      return {
        name: this.name,
        outcome: 'warn',
        skipped: true,
        detail: `找不到 ${service} 容器，略过 ping 检查`,
      }
    }

    const url = config.proxy.pingUrl
    const result = await runtime.exec(
      containerId,
      ['sh', '-lc', `curl -sf ${url} >/dev/null 2>&1 || wget -q --spider ${url}`],
      { timeoutMs: parseInterval(config.target.requestTimeout) }
    )
    if (result.exitCode === 0) {
      return { name: this.name, outcome: 'pass', detail: `${service} ping 通过` }
    }
    const reason = result.timedOut ? '超时' : `exit=${result.exitCode}`
    return { name: this.name, outcome: 'fail', detail: `${service} ping 失败 (${reason})` }
  },
}
