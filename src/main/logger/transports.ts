import { join } from 'path'
import { readdirSync, statSync, unlinkSync } from 'fs'
import type { LogMessage, Transport } from 'electron-log'
import type { AuditLevel, AuditLogEntry } from '@shared/types/session'

/**
 * 生成按日期命名的日志文件路径
 * 格式: <logsDir>/2026-02-19.log
 */
export function resolveLogPath(logsDir: string, today: Date = new Date()): string {
  const yyyy = today.getFullYear()
  const mm = String(today.getMonth() + 1).padStart(2, '0')
  const dd = String(today.getDate()).padStart(2, '0')
  const fileName = `${yyyy}-${mm}-${dd}.log`
  return join(logsDir, fileName)
}

/**
 * 清理超过指定天数的旧日志文件，返回删除的文件名
 */
export function cleanOldLogs(logsDir: string, maxAgeDays: number = 7): string[] {
  let files: string[]
  try {
    files = readdirSync(logsDir)
  } catch (err) {
    // logs 目录不存在时忽略
    if (isMissingDirectory(err)) return []
    throw err
  }

  const removed: string[] = []
  const now = Date.now()
  const maxAge = maxAgeDays * 24 * 60 * 60 * 1000

  for (const file of files) {
    if (!file.endsWith('.log')) continue
    const filePath = join(logsDir, file)
    const stat = statSync(filePath)
    if (now - stat.mtimeMs > maxAge) {
      unlinkSync(filePath)
      removed.push(file)
    }
  }
  return removed
}

export type AuditSink = (entry: AuditLogEntry) => void

/**
 * 审计 transport：把 warn / error 日志写入 audit_logs。
 * 写入失败时只输出到 stderr，避免日志递归。
 */
export function createAuditTransport(sink: AuditSink): Transport {
  let writing = false

  const write = (message: LogMessage): void => {
    const level = toAuditLevel(message.level)
    if (!level || writing) return

    writing = true
    try {
      sink({
        timestamp: message.date.getTime(),
        level,
        scope: message.scope ?? '',
        message: formatData(message.data),
        sessionId: findSessionId(message.data),
      })
    } catch (err) {
      process.stderr.write(`[audit] failed to write audit log: ${err instanceof Error ? err.message : String(err)}\n`)
    } finally {
      writing = false
    }
  }

  return Object.assign(write, { level: 'warn' as const, transforms: [] })
}

function toAuditLevel(level: LogMessage['level']): AuditLevel | null {
  if (level === 'warn' || level === 'error') return level
  return null
}

function formatData(data: unknown[]): string {
  return data
    .map((item) => {
      if (typeof item === 'string') return item
      if (item instanceof Error) return item.message
      try {
        return JSON.stringify(item, (_key, value: unknown) => (value instanceof Error ? value.message : value))
      } catch {
        return String(item)
      }
    })
    .join(' ')
}

function findSessionId(data: unknown[]): string | null {
  for (const item of data) {
    if (item && typeof item === 'object' && 'sessionId' in item && typeof item.sessionId === 'string') {
      return item.sessionId
    }
  }
  return null
}

function isMissingDirectory(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT'
}
