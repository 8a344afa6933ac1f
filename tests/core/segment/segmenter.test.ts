import { describe, it, expect } from 'vitest';
import { segmentTranscript, serializeSegments, formatHeader } from '../../../src/core/segment/segmenter.js';

describe('segmentTranscript', () => {
  it('should split on timestamp headers and number non-empty units', () => {
    const text = '前置き\n[0:00:00 - 0:00:05]\nこんにちは\n[0:00:05 - 0:00:10]\n   \n[0:00:10 - 0:00:15]\n次です\n';
    const { segments, warnings } = segmentTranscript(text);

    expect(warnings).toEqual([]);
    expect(segments).toEqual([
      { id: 1, start_time: '0:00:00', end_time: '0:00:05', text: 'こんにちは' },
      { id: 2, start_time: '0:00:10', end_time: '0:00:15', text: '次です' },
    ]);
  });

  it('should fall back to sentinel times for a malformed header', () => {
    const { segments, warnings } = segmentTranscript('[0:00 - 0:00:05]\n本文');

    expect(segments).toEqual([{ id: 1, start_time: '00:00:00', end_time: '00:00:00', text: '本文' }]);
    expect(warnings).toEqual([{
      header: '[0:00 - 0:00:05]',
      segmentId: 1,
      message: 'Unparseable timestamp header [0:00 - 0:00:05]',
    }]);
  });

  it('should keep bracketed citations in the body', () => {
    const { segments, warnings } = segmentTranscript('[0:00:01 - 0:00:05]\n参考文献[1-2]を参照します\n');

    expect(warnings).toEqual([]);
    expect(segments).toEqual([
      { id: 1, start_time: '0:00:01', end_time: '0:00:05', text: '参考文献[1-2]を参照します' },
    ]);
  });

  it('should return nothing for empty input', () => {
    expect(segmentTranscript('')).toEqual({ segments: [], warnings: [] });
    expect(segmentTranscript('ヘッダーのないテキスト').segments).toEqual([]);
  });
});

describe('serializeSegments', () => {
  it('should write header, text and a blank line per segment', () => {
    const out = serializeSegments([
      { start_time: '0:00:00', end_time: '0:00:05', corrected_text: '一つ目。' },
      { start_time: '0:00:05', end_time: '0:00:09', corrected_text: '二つ目。' },
    ]);

    expect(out).toBe('[0:00:00 - 0:00:05]\n一つ目。\n\n[0:00:05 - 0:00:09]\n二つ目。\n\n');
  });

  it('should re-segment to the same times and texts', () => {
    const text = '[0:00:00 - 0:00:05]\n最初の文\n[0:00:05 - 0:00:12]\n次の文\n';
    const { segments } = segmentTranscript(text);
    const again = segmentTranscript(serializeSegments(segments.map(s => ({ ...s, corrected_text: s.text }))));

    expect(again.segments).toEqual(segments);
  });

  it('should format headers', () => {
    expect(formatHeader('1:02:03', '1:02:09')).toBe('[1:02:03 - 1:02:09]');
  });
});
