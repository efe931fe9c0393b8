import log from 'electron-log/node'
import { resolveLogPath, cleanOldLogs, createAuditTransport } from './transports'
import type { AuditSink } from './transports'
import type { LogLevelSetting } from '@shared/types/config'

let initialized = false

// 初始化前不写文件
log.transports.file.level = false
log.transports.console.level = process.env.NODE_ENV === 'test' ? 'error' : 'warn'

export interface LoggerOptions {
  logsDir: string
  level?: LogLevelSetting
  /** 日志保留天数 */
  retentionDays?: number
}

export function isIgnorableStreamWriteError(err: NodeJS.ErrnoException): boolean {
  if (!err) return false
  return err.code === 'EPIPE' || err.code === 'EIO' || err.code === 'ERR_STREAM_DESTROYED'
}

/**
 * 初始化日志系统（进程启动后调用一次）
 */
export function initializeLogger(options: LoggerOptions): void {
  if (initialized) return

  // 父进程关闭管道时 stdout/stderr 写入会报 EPIPE/EIO，这些错误不应导致进程崩溃
  process.stdout?.on?.('error', (err: NodeJS.ErrnoException) => {
    if (!isIgnorableStreamWriteError(err)) throw err
  })
  process.stderr?.on?.('error', (err: NodeJS.ErrnoException) => {
    if (!isIgnorableStreamWriteError(err)) throw err
  })

  const isDev = process.env.NODE_ENV !== 'production'
  const level = options.level ?? (isDev ? 'debug' : 'info')

  // 文件 transport 配置
  log.transports.file.resolvePathFn = () => resolveLogPath(options.logsDir)
  log.transports.file.level = level
  log.transports.file.format = '[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}] {scope} {text}'
  log.transports.file.maxSize = 0

  // 控制台 transport 配置
  log.transports.console.level = isDev ? level : 'warn'

  cleanOldLogs(options.logsDir, options.retentionDays ?? 7)

  initialized = true
}

/**
 * 挂载审计 transport，返回卸载函数
 */
export function attachAuditSink(sink: AuditSink): () => void {
  log.transports.audit = createAuditTransport(sink)
  return () => {
    log.transports.audit = null
  }
}

/**
 * 获取带 scope 的 logger 实例
 */
export function getLogger(scope: string) {
  return log.scope(scope)
}

export default log
