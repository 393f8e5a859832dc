/**
 * 固定顺序的探测清单
 *
 * 顺序即输出顺序，保证多次运行的输出可以直接 diff
 */

import type { Config } from '../config/schema.js'
import { createServiceStateProbe } from './probes/serviceState.js'
import { proxyPingProbe } from './probes/proxyPing.js'
import { adminRouteProbe } from './probes/adminRoute.js'
import { frontendRouteProbe } from './probes/frontendRoute.js'
import { inferenceRouteProbe } from './probes/inferenceRoute.js'
import { internalReachProbe } from './probes/internalReach.js'
import type { AuditOptions, ProbeDescriptor } from './types.js'

export function buildBattery(config: Config, options: Pick<AuditOptions, 'skipInternal'>): ProbeDescriptor[] {
  const { proxy, inference, frontend } = config.services
  const probes: ProbeDescriptor[] = [
    createServiceStateProbe(proxy),
    createServiceStateProbe(inference),
    createServiceStateProbe(frontend),
    proxyPingProbe,
    adminRouteProbe,
    frontendRouteProbe,
    inferenceRouteProbe,
  ]

  // --skip-internal 时不加入清单，既不计 pass 也不计 fail
  if (!options.skipInternal) {
    probes.push(internalReachProbe)
  }
  return probes
}
