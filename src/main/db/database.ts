import Database from 'better-sqlite3'
import { dirname } from 'path'
import { mkdirSync } from 'fs'
import { up as initialSchema } from './migrations/001_initial'
import { up as performanceIndicators } from './migrations/002_performance_indicators'
import { getLogger } from '../logger'

const log = getLogger('Database')

export interface Migration {
  name: string
  up: (db: Database.Database) => void
}

/** 按顺序执行；名称记录在 _migrations 中 */
export const MIGRATIONS: readonly Migration[] = [
  { name: '001_initial', up: initialSchema },
  { name: '002_performance_indicators', up: performanceIndicators },
]

/** 文件库连接参数 */
const FILE_PRAGMAS = ['journal_mode = WAL', 'foreign_keys = ON', 'busy_timeout = 2000']

export interface DatabaseOptions {
  dbPath: string
}

let shared: Database.Database | null = null

/** 进程内共用一个连接，首次调用时打开并迁移 */
export function getDatabase(options: DatabaseOptions): Database.Database {
  if (shared) return shared

  mkdirSync(dirname(options.dbPath), { recursive: true })
  const connection = new Database(options.dbPath)
  for (const pragma of FILE_PRAGMAS) {
    connection.pragma(pragma)
  }
  const applied = runMigrations(connection)
  log.info('数据库已打开', { dbPath: options.dbPath, applied })

  shared = connection
  return connection
}

export function closeDatabase(): void {
  shared?.close()
  shared = null
}

/** 内存库，每次调用都是一个独立的空库 */
export function createTestDatabase(): Database.Database {
  const memory = new Database(':memory:')
  memory.pragma('foreign_keys = ON')
  runMigrations(memory)
  return memory
}

/** 执行尚未应用的迁移（同一事务），返回本次应用的名称 */
export function runMigrations(database: Database.Database, migrations: readonly Migration[] = MIGRATIONS): string[] {
  database.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name TEXT PRIMARY KEY,
      applied_at INTEGER NOT NULL
    )
  `)

  const done = new Set(
    database
      .prepare<[], { name: string }>('SELECT name FROM _migrations')
      .all()
      .map((row) => row.name)
  )
  const pending = migrations.filter((migration) => !done.has(migration.name))
  const record = database.prepare<[string, number]>('INSERT INTO _migrations (name, applied_at) VALUES (?, ?)')

  database.transaction(() => {
    for (const migration of pending) {
      migration.up(database)
      record.run(migration.name, Date.now())
    }
  })()
  return pending.map((migration) => migration.name)
}
