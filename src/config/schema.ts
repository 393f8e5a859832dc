import { z } from 'zod'
import { parseInterval } from '../shared/formatTime.js'

function tryParseInterval(value: string): number | null {
  try {
    return parseInterval(value)
  } catch {
    return null
  }
}

/** 时间间隔字符串（如 "5s", "10m"），在加载时校验格式 */
const intervalString = z
  .string()
  .refine(value => tryParseInterval(value) !== null, {
    message: 'expected an interval such as 500ms, 5s, 10m or 1h',
  })

/** 超时与轮询间隔：0 会变成无超时或空转，不接受 */
const positiveIntervalString = z
  .string()
  .refine(value => (tryParseInterval(value) ?? 0) > 0, {
    message: 'expected a non-zero interval such as 500ms, 5s or 1m',
  })

const port = z.number().int().min(1).max(65535)

export const targetConfigSchema = z.object({
  /** HTTP(S) 探测使用的外部主机/IP（对应 compose 映射的端口） */
  host: z.string().min(1).default('127.0.0.1'),
  /** 反向代理的 HTTPS 入口端口（dashboard / webui 路由） */
  httpsPort: port.default(8443),
  /** 反向代理的 HTTP 入口端口（推理 API 路由） */
  httpPort: port.default(8880),
  /** 单次 HTTP 请求超时 */
  requestTimeout: positiveIntervalString.default('10s'),
})

export const hostnamesConfigSchema = z.object({
  /** 管理面板虚拟主机名（TRAEFIK_HOSTNAME），缺省时跳过 dashboard 路由检查 */
  admin: z.string().min(1).optional(),
  /** 前端虚拟主机名（OLLAMA_HOSTNAME），缺省时跳过 webui 路由检查 */
  frontend: z.string().min(1).optional(),
})

export const servicesConfigSchema = z.object({
  proxy: z.string().default('traefik'),
  inference: z.string().default('ollama'),
  frontend: z.string().default('webui'),
})

export const proxyConfigSchema = z.object({
  /** 代理容器内部的健康端点 */
  pingUrl: z.string().default('http://localhost:8082/ping'),
  /** 管理 API 路径 */
  adminPath: z.string().default('/api/rawdata'),
})

export const inferenceConfigSchema = z.object({
  /** 推理服务控制端口（readiness gate / 模型拉取等待此端口） */
  host: z.string().default('127.0.0.1'),
  port: port.default(11434),
  /** 列出模型的 API 路径 */
  listPath: z.string().default('/api/tags'),
  /** 前端容器内访问推理服务的内部地址 */
  internalUrl: z.string().default('http://ollama:11434/api/tags'),
})

export const composeConfigSchema = z.object({
  file: z.string().default('./docker-compose.yml'),
  /** compose 项目名（-p），缺省由 compose 自行推导 */
  project: z.string().min(1).optional(),
  /** ps / inspect / exec 等查询命令的超时 */
  commandTimeout: positiveIntervalString.default('30s'),
  /** 服务组重启命令的超时 */
  restartTimeout: positiveIntervalString.default('5m'),
})

export const readinessConfigSchema = z.object({
  timeout: positiveIntervalString.default('2m'),
  interval: positiveIntervalString.default('2s'),
  attemptTimeout: positiveIntervalString.default('3s'),
})

export const bootstrapConfigSchema = z.object({
  /** 推理服务就绪后要拉取的模型 */
  models: z.array(z.string().min(1)).default([]),
})

export const recoveryConfigSchema = z.object({
  /** 执行存活判定的容器 */
  container: z.string().default('ollama-compose-ollama-1'),
  /** 在容器内执行的存活判定命令（加速器是否可见） */
  predicate: z.array(z.string()).min(1).default(['nvidia-smi']),
  /** 判定命令的超时，超时按失败处理（加速器故障时 nvidia-smi 常会卡住） */
  predicateTimeout: positiveIntervalString.default('30s'),
  /** monitor 常驻模式的检查间隔 */
  interval: z.string().regex(/^[1-9]\d*[mh]$/, 'expected minutes or hours, e.g. 5m').default('5m'),
  /** 两次重启之间的最短间隔，0s 关闭冷却 */
  cooldown: intervalString.default('10m'),
})

export const configSchema = z.object({
  target: targetConfigSchema.default({}),
  hostnames: hostnamesConfigSchema.default({}),
  services: servicesConfigSchema.default({}),
  proxy: proxyConfigSchema.default({}),
  inference: inferenceConfigSchema.default({}),
  compose: composeConfigSchema.default({}),
  readiness: readinessConfigSchema.default({}),
  bootstrap: bootstrapConfigSchema.default({}),
  recovery: recoveryConfigSchema.default({}),
})

export type TargetConfig = z.infer<typeof targetConfigSchema>
export type HostnamesConfig = z.infer<typeof hostnamesConfigSchema>
export type ServicesConfig = z.infer<typeof servicesConfigSchema>
export type ProxyConfig = z.infer<typeof proxyConfigSchema>
export type InferenceConfig = z.infer<typeof inferenceConfigSchema>
export type ComposeConfig = z.infer<typeof composeConfigSchema>
export type ReadinessConfig = z.infer<typeof readinessConfigSchema>
export type BootstrapConfig = z.infer<typeof bootstrapConfigSchema>
export type RecoveryConfig = z.infer<typeof recoveryConfigSchema>
export type Config = z.infer<typeof configSchema>
