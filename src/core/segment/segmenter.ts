import { SENTINEL_TIME, type RawSegment } from '../types.js';

export interface SegmentationResult {
  segments: RawSegment[];
  warnings: ParseWarning[];
}

export interface ParseWarning {
  header: string;
  segmentId: number;
  message: string;
}

// A bracketed range with a colon-separated time on each side opens a unit, even
// if it fails to parse; "[1-2]" and similar citations stay in the body
const HEADER_LIKE = /(\[\s*\d+:[\d:.]*\s*-\s*\d+:[\d:.]*\s*\])/;
const HEADER = /^\[(\d+:\d+:\d+) - (\d+:\d+:\d+)\]$/;

/**
 * Split a transcript into timestamped units. Text before the first header and
 * whitespace-only units are dropped; ids are assigned to retained units only.
 */
export function segmentTranscript(text: string): SegmentationResult {
  const parts = text.split(HEADER_LIKE);
  const segments: RawSegment[] = [];
  const warnings: ParseWarning[] = [];

  // parts: [preamble, header, body, header, body, ...]
  for (let i = 1; i < parts.length; i += 2) {
    const header = parts[i];
    const body = (parts[i + 1] ?? '').trim();
    if (!body) continue;

    const id = segments.length + 1;
    const match = header.match(HEADER);
    if (!match) {
      warnings.push({ header, segmentId: id, message: `Unparseable timestamp header ${header}` });
    }

    segments.push({
      id,
      start_time: match ? match[1] : SENTINEL_TIME,
      end_time: match ? match[2] : SENTINEL_TIME,
      text: body,
    });
  }

  return { segments, warnings };
}

export function formatHeader(startTime: string, endTime: string): string {
  return `[${startTime} - ${endTime}]`;
}

export function serializeSegments(
  segments: ReadonlyArray<{ start_time: string; end_time: string; corrected_text: string }>,
): string {
  return segments
    .map(s => `${formatHeader(s.start_time, s.end_time)}\n${s.corrected_text}\n\n`)
    .join('');
}
