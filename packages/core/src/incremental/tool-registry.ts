/**
 * Tool Registry
 *
 * Statically typed map of analysis tools, built once at startup. A tool is
 * either file-decomposable (findings attributable to single files, merged
 * through its reducer strategy) or whole-project (cached as one payload,
 * optionally keyed by dependency patterns).
 */

import { ConfigError } from '../utils/errors.js';
import { assertToolName } from '../cache/layout.js';
import type { JsonValue, ReducerStrategy, StrategyTable } from '../cache/types.js';

export interface AnalysisContext {
  projectRoot: string;
  /** Restrict analysis to these root-relative paths; absent means the whole project */
  files?: readonly string[];
  signal: AbortSignal;
}

export type AnalyzeFn = (context: AnalysisContext) => Promise<JsonValue>;

interface ToolDefinitionBase {
  name: string;
  analyze: AnalyzeFn;
  timeoutMs?: number;
}

export interface FileDecomposableTool extends ToolDefinitionBase {
  kind: 'file-decomposable';
  strategy: ReducerStrategy;
  /** False when the tool always analyzes the whole project (default: true) */
  honorsFileSubset?: boolean;
}

export interface WholeProjectTool extends ToolDefinitionBase {
  kind: 'whole-project';
  /** Root-relative paths or globs whose content the payload depends on */
  patterns?: readonly string[];
}

export type ToolDefinition = FileDecomposableTool | WholeProjectTool;

export class ToolRegistry {
  private tools = new Map<string, ToolDefinition>();

  constructor(definitions: readonly ToolDefinition[] = []) {
    for (const definition of definitions) {
      this.register(definition);
    }
  }

  register(definition: ToolDefinition): this {
    assertToolName(definition.name, 'ToolRegistry', 'register');
    if (this.tools.has(definition.name)) {
      throw new ConfigError(`Tool "${definition.name}" is already registered`, {
        component: 'ToolRegistry',
        operation: 'register',
        configKey: definition.name,
      });
    }
    this.tools.set(definition.name, definition);
    return this;
  }

  get(name: string): ToolDefinition {
    const definition = this.tools.get(name);
    if (!definition) {
      throw new ConfigError(`Unknown tool "${name}"`, {
        component: 'ToolRegistry',
        operation: 'get',
        configKey: name,
        recoveryHint: `Registered tools: ${this.names().join(', ') || 'none'}`,
      });
    }
    return definition;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  list(): ToolDefinition[] {
    return [...this.tools.values()];
  }

  /**
   * Strategy table for the result store
   */
  strategies(): StrategyTable {
    const table: Record<string, ReducerStrategy> = {};
    for (const definition of this.tools.values()) {
      if (definition.kind === 'file-decomposable') {
        table[definition.name] = definition.strategy;
      }
    }
    return table;
  }
}
