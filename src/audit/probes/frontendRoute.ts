import { parseInterval } from '../../shared/formatTime.js'
import { classifyStatus } from '../classify.js'
import type { ProbeDescriptor } from '../types.js'

export const frontendRouteProbe: ProbeDescriptor = {
  name: 'frontend-route',
  description: 'Request the web frontend root through its virtual host over HTTPS',
  async run({ config, options, http }) {
    const hostname = config.hostnames.frontend
    if (!hostname) {
      return {
        name: this.name,
        outcome: 'warn',
        skipped: true,
        detail: '未设定 OLLAMA_HOSTNAME，略过 WebUI 路由检查',
      }
    }

    const response = await http.get({
      url: `https://${options.host}:${config.target.httpsPort}/`,
      hostHeader: hostname,
      timeoutMs: parseInterval(config.target.requestTimeout),
    })
    if (!response.ok) {
      return { name: this.name, outcome: 'fail', detail: `WebUI HTTPS 无法连线: ${response.error.message}` }
    }

    const code = response.value
    const { outcome } = classifyStatus('frontend', code)
    return outcome === 'pass'
      ? { name: this.name, outcome, detail: `WebUI HTTPS 可用 (code=${code})` }
      : { name: this.name, outcome, detail: `WebUI HTTPS 异常 (code=${code})` }
  },
}
