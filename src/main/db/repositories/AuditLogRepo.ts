import type Database from 'better-sqlite3'
import type { AuditLevel, AuditLogEntry } from '@shared/types/session'

export class AuditLogRepo {
  constructor(private db: Database.Database) {}

  create(entry: AuditLogEntry): void {
    this.db
      .prepare(
        'INSERT INTO audit_logs (timestamp, level, scope, message, session_id) VALUES (?, ?, ?, ?, ?)'
      )
      .run(entry.timestamp, entry.level, entry.scope, entry.message, entry.sessionId)
  }

  listBySession(sessionId: string): AuditLogEntry[] {
    const rows = this.db
      .prepare<[string], AuditLogRow>('SELECT * FROM audit_logs WHERE session_id = ? ORDER BY id ASC')
      .all(sessionId)
    return rows.map((r) => this.toEntry(r))
  }

  private toEntry(row: AuditLogRow): AuditLogEntry {
    return {
      timestamp: row.timestamp,
      level: row.level,
      scope: row.scope,
      message: row.message,
      sessionId: row.session_id,
    }
  }
}

interface AuditLogRow {
  id: number
  timestamp: number
  level: AuditLevel
  scope: string
  message: string
  session_id: string | null
}
