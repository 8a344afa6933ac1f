import type Database from 'better-sqlite3';

export const SCHEMA_VERSION = 1;

export function initializeSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );

    CREATE TABLE IF NOT EXISTS runs (
      id TEXT PRIMARY KEY,
      source TEXT NOT NULL,
      created_at TEXT NOT NULL DEFAULT (datetime('now')),
      total_segments INTEGER NOT NULL,
      llm_usage INTEGER NOT NULL,
      average_quality REAL NOT NULL,
      high_quality_count INTEGER NOT NULL,
      total_cost REAL NOT NULL,
      input_tokens INTEGER NOT NULL,
      output_tokens INTEGER NOT NULL,
      processing_timestamp TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS segments (
      run_id TEXT NOT NULL,
      segment_id INTEGER NOT NULL,
      start_time TEXT NOT NULL,
      end_time TEXT NOT NULL,
      original_text TEXT NOT NULL,
      corrected_text TEXT NOT NULL,
      applied_corrections TEXT NOT NULL DEFAULT '[]',
      quality_score REAL NOT NULL,
      llm_used INTEGER NOT NULL DEFAULT 0,
      PRIMARY KEY (run_id, segment_id),
      FOREIGN KEY (run_id) REFERENCES runs(id) ON DELETE CASCADE
    );

    CREATE INDEX IF NOT EXISTS idx_runs_created ON runs(created_at);
    CREATE INDEX IF NOT EXISTS idx_segments_run ON segments(run_id);
  `);

  const version = db.prepare('SELECT MAX(version) as v FROM schema_version').get() as { v: number | null } | undefined;
  if (!version || version.v === null) {
    db.prepare('INSERT INTO schema_version (version) VALUES (?)').run(SCHEMA_VERSION);
  }
}
