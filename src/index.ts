export * from './services/frame2ttl-protocol'
export * from './services/frame2ttl-codec'
export * from './services/frame2ttl-generations'
export * from './services/frame2ttl-transport'
export * from './services/frame2ttl-session'
export * from './services/frame2ttl-stream'
export * from './services/config-store'
export { createLogger, setupLogService, type ScopedLogger } from './services/logger'
export { type ByteLink, listSerialPorts, makeSerialUri, SerialLink, type SerialPortSummary } from './services/link/serial'
