export { createSerialExecutor } from './serial-executor.js';
export type { SerialExecutor } from './serial-executor.js';
