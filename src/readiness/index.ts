/**
 * @entry Readiness Gate 模块
 */

export { parseEndpoint, describeEndpoint, type Endpoint } from './endpoint.js'
export {
  waitReady,
  defaultAttempt,
  type WaitOptions,
  type WaitSuccess,
  type WaitDeps,
  type ReadinessAttempt,
} from './waitReady.js'
