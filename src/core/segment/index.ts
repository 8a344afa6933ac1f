export { segmentTranscript, serializeSegments, formatHeader } from './segmenter.js';
export type { SegmentationResult, ParseWarning } from './segmenter.js';
