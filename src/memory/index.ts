export { MemoryConsolidator, entries_serialize } from './MemoryConsolidator.js';
export type { MemoryBatch, ConsolidatorConfig, Clock } from './types.js';
