/**
 * Tutor tools - Catalog, registry, handlers and executor
 */

export {
  TOOL_NAMES,
  ToolNameSchema,
  isToolName,
  ACTIVITY_PERIODS,
  type ToolName,
  type ToolArgs,
  type ToolDefinition,
  type ActivityPeriod,
  type JSONSchema,
  type JSONSchemaProperty,
} from './tool-catalog.js';

export {
  ToolRegistry,
  type ToolCall,
  type ToolContext,
  type ToolOutput,
  type ToolSpec,
  type ToolSpecs,
  type ReferenceField,
  type CatalogIssue,
} from './tool-registry.js';

export { createTutorTools, periodStart } from './tutor-tools.js';

export {
  ToolExecutor,
  isFatal,
  toValidationError,
  type CallOutcome,
  type CallStatus,
  type ExecutionStep,
} from './tool-executor.js';
