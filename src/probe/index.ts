export { createHttpProbe, type HttpProbe, type HttpRequest } from './httpProbe.js'
export { probeTcp } from './tcpProbe.js'
