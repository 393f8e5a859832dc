/**
 * 路由探测的状态码分类表
 *
 * | route     | 200  | 2xx  | 3xx  | 401         | 403              | 其他 |
 * | admin     | pass | fail | pass | pass (auth) | fail             | fail |
 * | frontend  | pass | pass | pass | fail        | fail             | fail |
 * | inference | pass | pass | pass | fail        | warn (allowlist) | fail |
 */

import type { ProbeOutcome } from './types.js'

export type RouteKind = 'admin' | 'frontend' | 'inference'

export interface Classification {
  outcome: ProbeOutcome
  /** auth-required: 401 说明路由存在且启用了认证；allowlist: 403 来自来源 IP 过滤 */
  note?: 'auth-required' | 'allowlist'
}

const isSuccess = (status: number): boolean => status >= 200 && status < 300
const isRedirect = (status: number): boolean => status >= 300 && status < 400

export function classifyStatus(route: RouteKind, status: number): Classification {
  switch (route) {
    case 'admin':
      if (status === 200 || isRedirect(status)) return { outcome: 'pass' }
      if (status === 401) return { outcome: 'pass', note: 'auth-required' }
      return { outcome: 'fail' }
    case 'frontend':
      return { outcome: isSuccess(status) || isRedirect(status) ? 'pass' : 'fail' }
    case 'inference':
      if (isSuccess(status) || isRedirect(status)) return { outcome: 'pass' }
      if (status === 403) return { outcome: 'warn', note: 'allowlist' }
      return { outcome: 'fail' }
  }
}
