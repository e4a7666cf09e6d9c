import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import Database from 'better-sqlite3'
import { StorageCorruptionError, StorageError } from '../errors/catalog.js'

interface Migration {
  version: number
  description: string
  statements: string[]
}

const MIGRATIONS: Migration[] = [
  {
    version: 1,
    description: 'sessions, directory cache, work queue, found files',
    statements: [
      `CREATE TABLE IF NOT EXISTS search_sessions (
        id TEXT PRIMARY KEY,
        root TEXT NOT NULL,
        recursive INTEGER NOT NULL,
        force INTEGER NOT NULL,
        dry_run INTEGER NOT NULL,
        status TEXT NOT NULL
          CHECK (status IN ('active', 'completed', 'interrupted', 'failed')),
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL,
        dirs_new INTEGER NOT NULL DEFAULT 0,
        dirs_resumed INTEGER NOT NULL DEFAULT 0,
        dirs_skipped INTEGER NOT NULL DEFAULT 0,
        dirs_errored INTEGER NOT NULL DEFAULT 0,
        files_found INTEGER NOT NULL DEFAULT 0,
        files_deleted INTEGER NOT NULL DEFAULT 0,
        error TEXT
      )`,
      `CREATE TABLE IF NOT EXISTS directory_cache (
        path TEXT PRIMARY KEY,
        last_searched INTEGER NOT NULL,
        completed INTEGER NOT NULL DEFAULT 0,
        session_id TEXT,
        error TEXT
      )`,
      `CREATE TABLE IF NOT EXISTS work_queue (
        session_id TEXT NOT NULL REFERENCES search_sessions (id) ON DELETE CASCADE,
        path TEXT NOT NULL,
        state TEXT NOT NULL DEFAULT 'pending'
          CHECK (state IN ('pending', 'in_progress', 'completed', 'failed')),
        enqueued_at INTEGER NOT NULL,
        resumed INTEGER NOT NULL DEFAULT 0,
        error TEXT,
        PRIMARY KEY (session_id, path)
      )`,
      `CREATE TABLE IF NOT EXISTS found_files (
        session_id TEXT NOT NULL REFERENCES search_sessions (id) ON DELETE CASCADE,
        path TEXT NOT NULL,
        found_at INTEGER NOT NULL,
        outcome TEXT
          CHECK (outcome IS NULL OR outcome IN ('deleted', 'dry_run', 'delete_failed')),
        error TEXT,
        PRIMARY KEY (session_id, path)
      )`,
      'CREATE INDEX IF NOT EXISTS idx_directory_cache_last_searched ON directory_cache (last_searched)',
      'CREATE INDEX IF NOT EXISTS idx_directory_cache_incomplete ON directory_cache (completed) WHERE completed = 0',
      'CREATE INDEX IF NOT EXISTS idx_work_queue_state ON work_queue (session_id, state)',
      'CREATE INDEX IF NOT EXISTS idx_search_sessions_root ON search_sessions (root, status)',
      'CREATE INDEX IF NOT EXISTS idx_search_sessions_status ON search_sessions (status, updated_at)',
      'CREATE INDEX IF NOT EXISTS idx_found_files_outcome ON found_files (session_id, outcome)',
    ],
  },
]

export const SCHEMA_VERSION = MIGRATIONS.reduce(
  (latest, m) => Math.max(latest, m.version),
  0,
)

/** Apply every migration newer than the database's user_version, one transaction each */
export function migrate(db: Database.Database): number {
  const current = db.pragma('user_version', { simple: true }) as number

  if (current > SCHEMA_VERSION) {
    throw new StorageError(
      `Cache database schema v${current} is newer than this build (v${SCHEMA_VERSION})`,
      { current, supported: SCHEMA_VERSION },
    )
  }

  for (const migration of MIGRATIONS) {
    if (migration.version <= current) continue
    db.transaction(() => {
      for (const sql of migration.statements) {
        db.exec(sql)
      }
      db.pragma(`user_version = ${migration.version}`)
    })()
  }

  return db.pragma('user_version', { simple: true }) as number
}

/** Open/create the cache database, set pragmas, verify integrity, migrate */
export function initializeDatabase(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true })
  }

  const db = new Database(dbPath)

  db.pragma('journal_mode = WAL')
  db.pragma('synchronous = NORMAL')
  db.pragma('foreign_keys = ON')
  db.pragma('busy_timeout = 10000')

  const integrity = db.pragma('quick_check', { simple: true })
  if (integrity !== 'ok') {
    db.close()
    throw new StorageCorruptionError({ dbPath, result: String(integrity) })
  }

  migrate(db)

  return db
}

/** Non-blocking WAL checkpoint, run once a sweep is over */
export function checkpoint(db: Database.Database): void {
  db.pragma('wal_checkpoint(PASSIVE)')
}
