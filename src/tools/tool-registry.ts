import type { z } from 'zod';
import type { EntityKind } from '../errors/index.js';
import type { Logger } from '../logging/logger.js';
import type { RecordStore } from '../storage/record-store.js';
import { TOOL_NAMES, isToolName, type ToolArgs, type ToolDefinition, type ToolName } from './tool-catalog.js';

/**
 * A call proposed by the interpreter. The tool name is not trusted until the
 * executor checks it against the registry.
 */
export interface ToolCall {
  id: string;
  tool: string;
  arguments: Record<string, unknown>;
}

/**
 * Injected into every handler
 */
export interface ToolContext {
  store: RecordStore;
  clock: () => Date;
  logger: Logger;
}

export interface ToolOutput {
  /** One-line summary for the tutor */
  message: string;
  data: Record<string, unknown>;
}

/**
 * An argument that names a stored entity
 */
export interface ReferenceField<Args> {
  field: keyof Args & string;
  kind: EntityKind;
}

export interface ToolSpec<Args> {
  definition: ToolDefinition;
  schema: z.ZodType<Args, z.ZodTypeDef, unknown>;
  references: ReadonlyArray<ReferenceField<Args>>;
  handler: (args: Args, context: ToolContext) => Promise<ToolOutput>;
}

/**
 * One spec for every tool name; a missing or extra tool is a compile error
 */
export type ToolSpecs = { [N in ToolName]: ToolSpec<ToolArgs[N]> };

export interface CatalogIssue {
  field: string;
  message: string;
}

/**
 * ToolRegistry - The fixed catalog of tools available to tutor commands
 *
 * Built once from a complete set of specs and never changed afterwards.
 */
export class ToolRegistry {
  private readonly specs: ToolSpecs;

  constructor(specs: ToolSpecs) {
    for (const name of TOOL_NAMES) {
      if (specs[name].definition.name !== name) {
        throw new Error(`Tool spec '${name}' declares definition '${specs[name].definition.name}'`);
      }
    }
    this.specs = Object.freeze({ ...specs });
  }

  /**
   * Tool definitions in catalog order
   */
  list(): ToolDefinition[] {
    return TOOL_NAMES.map(name => this.specs[name].definition);
  }

  has(name: string): name is ToolName {
    return isToolName(name);
  }

  get(name: string): ToolDefinition | undefined {
    return isToolName(name) ? this.specs[name].definition : undefined;
  }

  spec<N extends ToolName>(name: N): ToolSpec<ToolArgs[N]> {
    return this.specs[name];
  }

  /**
   * Referential arguments of a tool, with the kind of entity each names
   */
  references(name: ToolName): ReadonlyArray<{ field: string; kind: EntityKind }> {
    return this.specs[name].references;
  }

  /**
   * Checks a proposed call against the catalog: the tool must exist and every
   * required parameter must be present. Types are left to the executor.
   */
  checkConformance(tool: string, args: Record<string, unknown>): CatalogIssue[] {
    const definition = this.get(tool);
    if (!definition) {
      return [{ field: 'tool', message: `unknown tool '${tool}'; expected one of ${TOOL_NAMES.join(', ')}` }];
    }
    return definition.parameters.required
      .filter(key => args[key] === undefined || args[key] === null)
      .map(key => ({ field: key, message: `${tool} is missing required argument '${key}'` }));
  }
}
