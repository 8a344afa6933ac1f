import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { mkdtempSync, rmSync } from 'node:fs';
import { RunRepository } from '../../../src/core/db/repository.js';
import type { RunStatistics, Segment } from '../../../src/core/types.js';

const STATS: RunStatistics = {
  total_segments: 2,
  llm_usage: 1,
  average_quality: 0.875,
  high_quality_count: 2,
  total_cost: 0.0525,
  input_tokens: 100,
  output_tokens: 50,
  processing_timestamp: '2026-01-01T00:00:00.000Z',
};

const SEGMENTS: Segment[] = [
  {
    id: 1,
    start_time: '0:00:00',
    end_time: '0:00:05',
    original_text: '申しすございす',
    corrected_text: '申します。ございます。',
    applied_corrections: ['ending fix', 'ending fix', 'punctuation'],
    quality_score: 0.75,
    llm_used: false,
  },
  {
    id: 2,
    start_time: '0:00:05',
    end_time: '0:00:10',
    original_text: 'ベルトさんの話',
    corrected_text: 'ベルトン先生の話',
    applied_corrections: ['technical term', 'context correction'],
    quality_score: 1,
    llm_used: true,
  },
];

describe('RunRepository', () => {
  let dir: string;
  let db: RunRepository;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'lecfix-db-'));
    db = new RunRepository(join(dir, 'test.db'));
  });

  afterEach(() => {
    db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it('should save a run with its segments', () => {
    const record = db.saveRun('/lectures/day1.txt', STATS, SEGMENTS);

    expect(db.getRun(record.id)).toEqual(record);
    expect(record).toMatchObject({ source: '/lectures/day1.txt', ...STATS });
    expect(db.getRunSegments(record.id)).toEqual(SEGMENTS);
  });

  it('should list the most recent runs first', () => {
    const first = db.saveRun('a.txt', STATS, []);
    const second = db.saveRun('b.txt', STATS, []);
    db.saveRun('c.txt', STATS, []);

    const runs = db.getRuns(2);
    expect(runs).toHaveLength(2);
    expect(runs.map(r => r.id)).not.toContain(first.id);
    expect(runs[1].id).toBe(second.id);
    expect(db.getRunCount()).toBe(3);
  });

  it('should total corrections by category', () => {
    db.saveRun('a.txt', STATS, SEGMENTS);
    db.saveRun('b.txt', STATS, SEGMENTS.slice(0, 1));

    expect(db.getCategoryTotals()).toEqual({
      'ending fix': 4,
      'punctuation': 2,
      'technical term': 1,
      'context correction': 1,
    });
  });

  it('should delete a run and its segments', () => {
    const record = db.saveRun('a.txt', STATS, SEGMENTS);

    expect(db.deleteRun(record.id)).toBe(true);
    expect(db.getRun(record.id)).toBeNull();
    expect(db.getRunSegments(record.id)).toEqual([]);
    expect(db.deleteRun(record.id)).toBe(false);
  });

  it('should return null for an unknown run', () => {
    expect(db.getRun('missing')).toBeNull();
  });
});
