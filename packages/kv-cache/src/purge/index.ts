export { createPurgeScheduler, DEFAULT_PURGE_POLICY } from './purge-scheduler.js';
export { purgeExpiredFiles } from './purge-expired-files.js';
export type {
  PurgeExpiredFilesOptions,
  PurgePolicy,
  PurgeScheduler,
  PurgeSchedulerOptions,
} from './types.js';
