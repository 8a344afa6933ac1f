export { processDirectory, correctedFileName, defaultOutputDir, BATCH_STATISTICS_FILE } from './batch.js';
export type { BatchResult, BatchFileResult, BatchFailure, BatchOptions } from './batch.js';
