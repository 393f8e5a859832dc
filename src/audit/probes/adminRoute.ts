import { parseInterval } from '../../shared/formatTime.js'
import { classifyStatus } from '../classify.js'
import type { ProbeDescriptor } from '../types.js'

export const adminRouteProbe: ProbeDescriptor = {
  name: 'admin-route',
  description: 'Request the proxy admin API through its virtual host',
  async run({ config, options, http }) {
    const hostname = config.hostnames.admin
    if (!hostname) {
      return {
        name: this.name,
        outcome: 'warn',
        skipped: true,
        detail: '未设定 TRAEFIK_HOSTNAME，略过 dashboard 路由检查',
      }
    }

    // 只有帐号密码都提供时才带 BasicAuth
    const auth =
      options.dashboardUser && options.dashboardPass
        ? { username: options.dashboardUser, password: options.dashboardPass }
        : undefined

    const response = await http.get({
      url: `https://${options.host}:${config.target.httpsPort}${config.proxy.adminPath}`,
      hostHeader: hostname,
      auth,
      timeoutMs: parseInterval(config.target.requestTimeout),
    })
    if (!response.ok) {
      return { name: this.name, outcome: 'fail', detail: `Dashboard 路由无法连线: ${response.error.message}` }
    }

    const code = response.value
    const { outcome, note } = classifyStatus('admin', code)
    if (outcome !== 'pass') {
      return { name: this.name, outcome, detail: `Dashboard 路由异常，回应 ${code}` }
    }
    if (note === 'auth-required') {
      return { name: this.name, outcome, detail: 'Dashboard 路由可用，但需要 BasicAuth (401 预期)' }
    }
    return {
      name: this.name,
      outcome,
      detail: code === 200 ? 'Dashboard 路由可用 (200)' : `Dashboard 路由回应 ${code}`,
    }
  },
}
