import { parseInterval } from '../../shared/formatTime.js'
import { classifyStatus } from '../classify.js'
import type { ProbeDescriptor } from '../types.js'

export const inferenceRouteProbe: ProbeDescriptor = {
  name: 'inference-route',
  description: 'List models on the inference API through the proxy HTTP entrypoint',
  async run({ config, options, http }) {
    const response = await http.get({
      url: `http://${options.host}:${config.target.httpPort}${config.inference.listPath}`,
      timeoutMs: parseInterval(config.target.requestTimeout),
    })
    if (!response.ok) {
      return { name: this.name, outcome: 'fail', detail: `推理 API HTTP 无法连线: ${response.error.message}` }
    }

    const code = response.value
    const { outcome, note } = classifyStatus('inference', code)
    if (note === 'allowlist') {
      return {
        name: this.name,
        outcome,
        detail: '推理 API 回应 403（可能被 IP allowlist 阻挡）。确认来源 IP 是否在白名单内。',
      }
    }
    return outcome === 'pass'
      ? { name: this.name, outcome, detail: `推理 API HTTP 可用 (code=${code})` }
      : { name: this.name, outcome, detail: `推理 API HTTP 异常 (code=${code})` }
  },
}
