import { getErrorMessage } from '../../shared/assertError.js'
import type { ProbeDescriptor } from '../types.js'

/** health 为这两种取值时视为健康（none = 未配置 healthcheck） */
const HEALTHY_STATES = new Set(['healthy', 'none'])

export function createServiceStateProbe(service: string): ProbeDescriptor {
  return {
    name: `service:${service}`,
    description: `Check that compose service ${service} is running and healthy`,
    async run({ runtime }) {
      const name = this.name
      try {
        const containerId = await runtime.findContainer(service)
        if (!containerId) {
          return { name, outcome: 'fail', detail: `service=${service} 未启动（无容器）` }
        }

        const { status, health } = await runtime.inspect(containerId)
        if (status !== 'running') {
          return { name, outcome: 'fail', detail: `service=${service} 状态=${status}` }
        }
        return {
          name,
          outcome: HEALTHY_STATES.has(health) ? 'pass' : 'warn',
          detail: `service=${service} running (health=${health})`,
        }
      } catch (error) {
        return { name, outcome: 'fail', detail: `service=${service} 查询失败: ${getErrorMessage(error)}` }
      }
    },
  }
}
