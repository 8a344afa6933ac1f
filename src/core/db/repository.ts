import Database from 'better-sqlite3';
import { randomUUID } from 'node:crypto';
import { initializeSchema } from './schema.js';
import type { CorrectionCategory, RunStatistics, Segment } from '../types.js';

export interface RunRecord extends RunStatistics {
  id: string;
  source: string;
  created_at: string;
}

export class RunRepository {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    initializeSchema(this.db);
  }

  close(): void {
    this.db.close();
  }

  // --- Runs ---

  /**
   * Store a finished run and its segments atomically.
   */
  saveRun(source: string, statistics: RunStatistics, segments: readonly Segment[]): RunRecord {
    const id = randomUUID();
    const now = new Date().toISOString();

    const insertRun = this.db.prepare(`
      INSERT INTO runs (id, source, created_at, total_segments, llm_usage, average_quality, high_quality_count, total_cost, input_tokens, output_tokens, processing_timestamp)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const insertSegment = this.db.prepare(`
      INSERT INTO segments (run_id, segment_id, start_time, end_time, original_text, corrected_text, applied_corrections, quality_score, llm_used)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    this.db.transaction(() => {
      insertRun.run(
        id,
        source,
        now,
        statistics.total_segments,
        statistics.llm_usage,
        statistics.average_quality,
        statistics.high_quality_count,
        statistics.total_cost,
        statistics.input_tokens,
        statistics.output_tokens,
        statistics.processing_timestamp,
      );
      for (const s of segments) {
        insertSegment.run(
          id,
          s.id,
          s.start_time,
          s.end_time,
          s.original_text,
          s.corrected_text,
          JSON.stringify(s.applied_corrections),
          s.quality_score,
          s.llm_used ? 1 : 0,
        );
      }
    })();

    return { ...statistics, id, source, created_at: now };
  }

  getRun(id: string): RunRecord | null {
    const row = this.db.prepare('SELECT * FROM runs WHERE id = ?').get(id) as RunRow | undefined;
    return row ? this.rowToRun(row) : null;
  }

  getRuns(limit = 20): RunRecord[] {
    const rows = this.db.prepare(
      'SELECT * FROM runs ORDER BY created_at DESC, rowid DESC LIMIT ?'
    ).all(limit) as RunRow[];
    return rows.map(r => this.rowToRun(r));
  }

  getRunSegments(runId: string): Segment[] {
    const rows = this.db.prepare(
      'SELECT * FROM segments WHERE run_id = ? ORDER BY segment_id'
    ).all(runId) as SegmentRow[];

    return rows.map(r => ({
      id: r.segment_id,
      start_time: r.start_time,
      end_time: r.end_time,
      original_text: r.original_text,
      corrected_text: r.corrected_text,
      applied_corrections: JSON.parse(r.applied_corrections) as CorrectionCategory[],
      quality_score: r.quality_score,
      llm_used: r.llm_used === 1,
    }));
  }

  deleteRun(id: string): boolean {
    return this.db.prepare('DELETE FROM runs WHERE id = ?').run(id).changes > 0;
  }

  // --- Analytics ---

  getCategoryTotals(): Record<string, number> {
    const rows = this.db.prepare('SELECT applied_corrections FROM segments').all() as { applied_corrections: string }[];

    const result: Record<string, number> = {};
    for (const row of rows) {
      for (const category of JSON.parse(row.applied_corrections) as string[]) {
        result[category] = (result[category] ?? 0) + 1;
      }
    }
    return result;
  }

  getRunCount(): number {
    const row = this.db.prepare('SELECT COUNT(*) as c FROM runs').get() as { c: number };
    return row.c;
  }

  // --- Helpers ---

  private rowToRun(row: RunRow): RunRecord {
    return {
      id: row.id,
      source: row.source,
      created_at: row.created_at,
      total_segments: row.total_segments,
      llm_usage: row.llm_usage,
      average_quality: row.average_quality,
      high_quality_count: row.high_quality_count,
      total_cost: row.total_cost,
      input_tokens: row.input_tokens,
      output_tokens: row.output_tokens,
      processing_timestamp: row.processing_timestamp,
    };
  }
}

// Row types for SQLite
interface RunRow {
  id: string;
  source: string;
  created_at: string;
  total_segments: number;
  llm_usage: number;
  average_quality: number;
  high_quality_count: number;
  total_cost: number;
  input_tokens: number;
  output_tokens: number;
  processing_timestamp: string;
}

interface SegmentRow {
  run_id: string;
  segment_id: number;
  start_time: string;
  end_time: string;
  original_text: string;
  corrected_text: string;
  applied_corrections: string;
  quality_score: number;
  llm_used: number;
}
