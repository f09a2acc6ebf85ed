import type { ToolDefinition } from '../tools/tool-catalog.js';
import type { Student, LearningObject } from '../storage/records.js';

/**
 * Roster snapshot shown to the language capability so it can pick ids
 */
export interface RosterSnapshot {
  students: Student[];
  learning_objects: LearningObject[];
}

export interface CapabilityRequest {
  instruction: string;
  tools: ToolDefinition[];
  roster: RosterSnapshot;
  /** Set on the retry after an unusable answer */
  strict: boolean;
  /** What was wrong with the previous answer */
  problems?: string[];
}

/**
 * The natural-language understanding service, treated as a black box.
 *
 * Implementations return whatever structured payload they produced; the
 * interpreter validates it. They must stop work and reject when `signal`
 * aborts.
 */
export interface LanguageCapability {
  readonly name: string;
  interpret(request: CapabilityRequest, signal: AbortSignal): Promise<unknown>;
}
