/**
 * Tutor Command Center - Natural-language commands over student records
 */

export { Workspace, COLLECTION_FILES, type CollectionName } from './storage/workspace.js';
export {
  RecordStore,
  type RecordStoreOptions,
  type AssignmentFilter,
  type AssignmentPatch,
} from './storage/record-store.js';
export {
  StudentSchema,
  LearningObjectSchema,
  AssignmentSchema,
  ActivityLogEntrySchema,
  ASSIGNMENT_STATUSES,
  type Student,
  type LearningObject,
  type Assignment,
  type AssignmentStatus,
  type ActivityLogEntry,
} from './storage/records.js';
export { atomicWrite } from './storage/atomic-write.js';

export {
  ConfigManager,
  TutorCommandConfigSchema,
  DEFAULT_CONFIG,
  type TutorCommandConfig,
  type PartialTutorCommandConfig,
  type ConfigValidationResult,
} from './config/config-manager.js';

export * from './errors/index.js';
export * from './logging/index.js';
export * from './resolver/index.js';
export * from './tools/index.js';
export * from './capability/index.js';
export * from './interpreter/index.js';
export * from './command/index.js';
export * from './gateway/index.js';
