import type Database from 'better-sqlite3'
import type { MediaFile, MediaKind } from '@shared/types/session'

export class MediaFileRepo {
  constructor(private db: Database.Database) {}

  nextSequence(sessionId: string, kind: MediaKind): number {
    const row = this.db
      .prepare<[string, MediaKind], { last: number | null }>(
        'SELECT MAX(sequence) as last FROM media_files WHERE session_id = ? AND kind = ?'
      )
      .get(sessionId, kind)
    return (row?.last ?? 0) + 1
  }

  create(media: MediaFile): MediaFile {
    this.db
      .prepare(
        `INSERT INTO media_files (id, session_id, kind, file_path, sequence, size_bytes, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      )
      .run(media.id, media.sessionId, media.kind, media.filePath, media.sequence, media.sizeBytes, media.createdAt)
    return media
  }

  listBySession(sessionId: string, kind?: MediaKind): MediaFile[] {
    const rows = kind
      ? this.db
          .prepare<[string, MediaKind], MediaFileRow>(
            'SELECT * FROM media_files WHERE session_id = ? AND kind = ? ORDER BY sequence ASC'
          )
          .all(sessionId, kind)
      : this.db
          .prepare<[string], MediaFileRow>(
            'SELECT * FROM media_files WHERE session_id = ? ORDER BY kind ASC, sequence ASC'
          )
          .all(sessionId)
    return rows.map((r) => this.toMediaFile(r))
  }

  private toMediaFile(row: MediaFileRow): MediaFile {
    return {
      id: row.id,
      sessionId: row.session_id,
      kind: row.kind,
      filePath: row.file_path,
      sequence: row.sequence,
      sizeBytes: row.size_bytes,
      createdAt: row.created_at,
    }
  }
}

interface MediaFileRow {
  id: string
  session_id: string
  kind: MediaKind
  file_path: string
  sequence: number
  size_bytes: number
  created_at: number
}
