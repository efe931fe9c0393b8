import type Database from 'better-sqlite3'

export function up(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS resumes (
      user_id TEXT PRIMARY KEY,
      name TEXT,
      email TEXT,
      experience_level TEXT NOT NULL,
      years_of_experience INTEGER NOT NULL,
      domain_expertise TEXT NOT NULL DEFAULT '[]',
      skills TEXT NOT NULL DEFAULT '[]',
      recent_role TEXT,
      raw_text TEXT,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS sessions (
      id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL,
      status TEXT NOT NULL DEFAULT 'created',
      ai_provider TEXT NOT NULL,
      ai_model TEXT NOT NULL,
      enabled_modes TEXT NOT NULL DEFAULT '[]',
      active_modes TEXT NOT NULL DEFAULT '[]',
      resume_data TEXT,
      duration_minutes INTEGER,
      created_at INTEGER NOT NULL,
      started_at INTEGER,
      ended_at INTEGER
    );

    CREATE INDEX IF NOT EXISTS idx_sessions_created
      ON sessions(created_at DESC);

    CREATE INDEX IF NOT EXISTS idx_sessions_user
      ON sessions(user_id);

    CREATE TABLE IF NOT EXISTS conversation_messages (
      seq INTEGER PRIMARY KEY AUTOINCREMENT,
      id TEXT NOT NULL UNIQUE,
      session_id TEXT NOT NULL,
      role TEXT NOT NULL,
      content TEXT NOT NULL,
      timestamp INTEGER NOT NULL,
      FOREIGN KEY (session_id) REFERENCES sessions(id) ON DELETE CASCADE
    );

    CREATE INDEX IF NOT EXISTS idx_messages_session_order
      ON conversation_messages(session_id, timestamp, seq);

    CREATE TABLE IF NOT EXISTS media_files (
      id TEXT PRIMARY KEY,
      session_id TEXT NOT NULL,
      kind TEXT NOT NULL,
      file_path TEXT NOT NULL,
      sequence INTEGER NOT NULL,
      size_bytes INTEGER NOT NULL DEFAULT 0,
      created_at INTEGER NOT NULL,
      UNIQUE (session_id, kind, sequence),
      FOREIGN KEY (session_id) REFERENCES sessions(id) ON DELETE CASCADE
    );

    CREATE TABLE IF NOT EXISTS evaluations (
      id TEXT PRIMARY KEY,
      session_id TEXT NOT NULL UNIQUE,
      overall_score REAL NOT NULL,
      competency_scores TEXT NOT NULL DEFAULT '{}',
      went_well TEXT NOT NULL DEFAULT '[]',
      went_okay TEXT NOT NULL DEFAULT '[]',
      needs_improvement TEXT NOT NULL DEFAULT '[]',
      communication_analysis TEXT NOT NULL DEFAULT '{}',
      improvement_plan TEXT NOT NULL DEFAULT '{}',
      created_at INTEGER NOT NULL,
      FOREIGN KEY (session_id) REFERENCES sessions(id) ON DELETE CASCADE
    );

    CREATE TABLE IF NOT EXISTS token_usage (
      id TEXT PRIMARY KEY,
      session_id TEXT NOT NULL,
      operation TEXT NOT NULL,
      provider TEXT NOT NULL,
      model TEXT NOT NULL,
      input_tokens INTEGER NOT NULL,
      output_tokens INTEGER NOT NULL,
      cost_micros INTEGER NOT NULL,
      created_at INTEGER NOT NULL,
      FOREIGN KEY (session_id) REFERENCES sessions(id) ON DELETE CASCADE
    );

    CREATE INDEX IF NOT EXISTS idx_token_usage_session
      ON token_usage(session_id, operation);

    CREATE TABLE IF NOT EXISTS audit_logs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      timestamp INTEGER NOT NULL,
      level TEXT NOT NULL,
      scope TEXT NOT NULL DEFAULT '',
      message TEXT NOT NULL,
      session_id TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_audit_logs_session
      ON audit_logs(session_id);
  `)
}
