// src/core/checkpoint/index.ts
export { CheckpointStore } from './store.js';
export { unionFailures, countFailures, failuresFor } from './failures.js';
export type { CheckpointFile } from './types.js';
