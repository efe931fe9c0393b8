import type Database from 'better-sqlite3'
import type { Message, MessageRole } from '@shared/types/session'

export class MessageRepo {
  constructor(private db: Database.Database) {}

  /** 按 id 幂等插入，重复 id 不会产生第二条记录 */
  append(message: Message): void {
    this.db
      .prepare(
        `INSERT INTO conversation_messages (id, session_id, role, content, timestamp)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT(id) DO NOTHING`
      )
      .run(message.id, message.sessionId, message.role, message.content, message.timestamp)
  }

  getById(id: string): Message | null {
    const row = this.db
      .prepare<[string], MessageRow>('SELECT * FROM conversation_messages WHERE id = ?')
      .get(id)
    return row ? this.toMessage(row) : null
  }

  getLastTimestamp(sessionId: string): number | null {
    const row = this.db
      .prepare<[string], { last: number | null }>(
        'SELECT MAX(timestamp) as last FROM conversation_messages WHERE session_id = ?'
      )
      .get(sessionId)
    return row?.last ?? null
  }

  listBySession(sessionId: string): Message[] {
    const rows = this.db
      .prepare<[string], MessageRow>(
        'SELECT * FROM conversation_messages WHERE session_id = ? ORDER BY timestamp ASC, seq ASC'
      )
      .all(sessionId)
    return rows.map((r) => this.toMessage(r))
  }

  countBySession(sessionId: string): number {
    const row = this.db
      .prepare<[string], { count: number }>(
        'SELECT COUNT(*) as count FROM conversation_messages WHERE session_id = ?'
      )
      .get(sessionId)
    return row?.count ?? 0
  }

  private toMessage(row: MessageRow): Message {
    return {
      id: row.id,
      sessionId: row.session_id,
      role: row.role,
      content: row.content,
      timestamp: row.timestamp,
    }
  }
}

interface MessageRow {
  seq: number
  id: string
  session_id: string
  role: MessageRole
  content: string
  timestamp: number
}
