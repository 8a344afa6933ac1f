import { describe, it, expect } from 'vitest';
import {
  scoreQuality, detectObviousImprovement, detectDeterioration, clampScore,
} from '../../../src/core/scoring/scorer.js';

describe('scoreQuality', () => {
  it('should weight each distinct category in the refined variant', () => {
    const score = scoreQuality('申しすございす', '申します。ございます。', ['ending fix', 'ending fix', 'punctuation']);
    expect(score).toBeCloseTo(0.75);
  });

  it('should count distinct categories in the simple variant', () => {
    const score = scoreQuality('申しすございす', '申します。ございます。', ['ending fix', 'ending fix', 'punctuation'], 'simple');
    expect(score).toBeCloseTo(0.7);
  });

  it('should cap the simple category bonus', () => {
    const score = scoreQuality('ああああ', 'ああああ', ['technical term', 'ending fix', 'punctuation', 'naturalization', 'filler removal'], 'simple');
    // 0.3 base + 0.7 cap + 0.1 length
    expect(score).toBe(1);
  });

  it('should reward an obvious improvement and clamp to 1', () => {
    const score = scoreQuality(
      'Day2になるDay2の講座です',
      'Day2の講座です',
      ['repetition removal', 'technical term', 'ending fix', 'punctuation', 'naturalization'],
    );
    expect(score).toBe(1);
  });

  it('should penalise a lost keyword', () => {
    expect(scoreQuality('講師です', 'です', [])).toBeCloseTo(0.2);
  });

  it('should stay within [0, 1]', () => {
    const cases: Array<[string, string]> = [
      ['', ''],
      ['講師の皆さん', ''],
      ['短い', 'とても長くなった修正後のテキストです'],
      ['ありがとうございます', 'りがとうございます'],
    ];
    for (const [original, corrected] of cases) {
      const score = scoreQuality(original, corrected, []);
      expect(score).toBeGreaterThanOrEqual(0);
      expect(score).toBeLessThanOrEqual(1);
    }
  });
});

describe('detectObviousImprovement', () => {
  it('should detect a collapsed duplicate phrase', () => {
    expect(detectObviousImprovement('今日はDay2になるDay2です', '今日はDay2です')).toBe(true);
  });

  it('should not mistake ordinary prose around になる for a duplicate', () => {
    expect(detectObviousImprovement('とても気になる気持ちです', 'とても気持ちです')).toBe(false);
  });

  it('should detect a new sentence boundary after ます', () => {
    expect(detectObviousImprovement('始めますタイトルは', '始めます。タイトルは')).toBe(true);
    expect(detectObviousImprovement('始めますタイトルは', '始めますタイトルは')).toBe(false);
  });

  it('should detect a softened hedge', () => {
    expect(detectObviousImprovement('使えるかなと思っている', '使えるかと思っている')).toBe(true);
  });
});

describe('detectDeterioration', () => {
  it('should detect a truncated closing phrase', () => {
    expect(detectDeterioration('ありがとうございます', 'りがとうございます')).toBe(true);
    expect(detectDeterioration('ありがとうございます', 'ありがとうございます')).toBe(false);
  });

  it('should detect a vanished keyword', () => {
    expect(detectDeterioration('皆さんこんにちは', 'こんにちは')).toBe(true);
    expect(detectDeterioration('皆さんこんにちは', '皆さん、こんにちは')).toBe(false);
  });
});

describe('clampScore', () => {
  it('should clamp to the unit interval', () => {
    expect(clampScore(-0.5)).toBe(0);
    expect(clampScore(1.4)).toBe(1);
    expect(clampScore(0.42)).toBe(0.42);
  });
});
