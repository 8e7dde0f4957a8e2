/**
 * Reducer strategies
 *
 * Each file-decomposable tool pairs an `extract` that splits its payload
 * into findings keyed by file with a `reduce` that rebuilds the aggregate
 * from the whole per-file map. Paths are visited in sorted order so the
 * aggregate only depends on the map's contents.
 */

import { normalizeReportedPath } from '../discovery/file-walker.js';
import type {
  Finding,
  JsonObject,
  JsonValue,
  PerFileFindings,
  ReducerStrategy,
  StrategyTable,
} from '../cache/types.js';

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * First non-empty string among `keys` on a finding
 */
function findingPath(finding: JsonObject, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const value = finding[key];
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
  }
  return undefined;
}

function groupByFile(
  findings: readonly JsonValue[],
  pathKeys: readonly string[],
  projectRoot: string,
  into: PerFileFindings
): void {
  for (const finding of findings) {
    if (!isJsonObject(finding)) {
      continue;
    }
    const reported = findingPath(finding, pathKeys);
    if (!reported) {
      continue;
    }
    const file = normalizeReportedPath(reported, projectRoot);
    const list = into[file];
    if (list) {
      list.push(finding);
    } else {
      into[file] = [finding];
    }
  }
}

/**
 * All findings, in sorted path order
 */
export function flattenFindings(perFileFindings: PerFileFindings): Finding[] {
  return Object.keys(perFileFindings)
    .sort()
    .flatMap((file) => perFileFindings[file] ?? []);
}

// ============================================================================
// Flat finding list
// ============================================================================

export interface FindingListOptions {
  /** Payload key holding the finding array */
  listKey: string;
  /** Finding keys that may carry the file path, tried in order */
  pathKeys: readonly string[];
  /** Aggregate key for the finding count */
  totalKey: string;
  /** Value of the aggregate's `tool` key, omitted when unset */
  tool?: string;
  /** Status when at least one finding exists */
  foundStatus: string;
  /** Status when none exist (default: "clean") */
  cleanStatus?: string;
  /** Cap on findings listed in the aggregate; the total is not capped */
  limit?: number;
}

export function findingListStrategy(options: FindingListOptions): ReducerStrategy {
  const { listKey, pathKeys, totalKey, tool, foundStatus, cleanStatus = 'clean', limit } = options;

  return {
    extract(payload, projectRoot) {
      const perFile: PerFileFindings = {};
      if (isJsonObject(payload)) {
        const list = payload[listKey];
        if (Array.isArray(list)) {
          groupByFile(list, pathKeys, projectRoot, perFile);
        }
      }
      return perFile;
    },

    reduce(perFileFindings) {
      const all = flattenFindings(perFileFindings);
      const aggregate: JsonObject = {};
      if (tool !== undefined) {
        aggregate.tool = tool;
      }
      aggregate.status = all.length > 0 ? foundStatus : cleanStatus;
      aggregate[totalKey] = all.length;
      aggregate[listKey] = limit === undefined ? all : all.slice(0, limit);
      return aggregate;
    },
  };
}

// ============================================================================
// Categorized findings
// ============================================================================

export interface CategorizedOptions {
  /** Payload keys, one finding array each */
  categories: readonly string[];
  pathKeys: readonly string[];
  /** Finding key naming its category */
  categoryKey: string;
  /** Category assumed when a finding names none (default: first category) */
  defaultCategory?: string;
  tool?: string;
}

export function categorizedStrategy(options: CategorizedOptions): ReducerStrategy {
  const { categories, pathKeys, categoryKey, tool } = options;
  const defaultCategory = options.defaultCategory ?? categories[0] ?? 'other';

  return {
    extract(payload, projectRoot) {
      const perFile: PerFileFindings = {};
      if (!isJsonObject(payload)) {
        return perFile;
      }
      for (const category of categories) {
        const list = payload[category];
        if (Array.isArray(list)) {
          groupByFile(list, pathKeys, projectRoot, perFile);
        }
      }
      return perFile;
    },

    reduce(perFileFindings) {
      const grouped = new Map<string, Finding[]>(categories.map((category) => [category, []]));
      for (const finding of flattenFindings(perFileFindings)) {
        const named = isJsonObject(finding) ? finding[categoryKey] : undefined;
        const category = typeof named === 'string' ? named : defaultCategory;
        // Findings outside the known categories stay per-file only
        grouped.get(category)?.push(finding);
      }

      let total = 0;
      for (const list of grouped.values()) {
        total += list.length;
      }

      const aggregate: JsonObject = {};
      if (tool !== undefined) {
        aggregate.tool = tool;
      }
      aggregate.status = total > 0 ? 'issues_found' : 'clean';
      aggregate.total_issues = total;
      for (const [category, list] of grouped) {
        aggregate[category] = list;
      }
      return aggregate;
    },
  };
}

// ============================================================================
// Built-in table
// ============================================================================

export const LINT_CATEGORIES = ['quality', 'style', 'imports', 'performance', 'security', 'complexity'] as const;

export const DEFAULT_STRATEGIES: StrategyTable = {
  bandit: findingListStrategy({
    listKey: 'issues',
    pathKeys: ['filename', 'file'],
    totalKey: 'total_issues',
    tool: 'bandit',
    foundStatus: 'issues_found',
    limit: 50,
  }),
  secrets: findingListStrategy({
    listKey: 'findings',
    pathKeys: ['filename', 'file'],
    totalKey: 'total_secrets',
    tool: 'detect-secrets',
    foundStatus: 'secrets_found',
  }),
  deadcode: findingListStrategy({
    listKey: 'dead_code',
    pathKeys: ['file'],
    totalKey: 'total_dead',
    tool: 'vulture',
    foundStatus: 'issues_found',
    limit: 30,
  }),
  efficiency: findingListStrategy({
    listKey: 'high_complexity_functions',
    pathKeys: ['file'],
    totalKey: 'total_high_complexity',
    foundStatus: 'analyzed',
    cleanStatus: 'analyzed',
  }),
  typing: findingListStrategy({
    listKey: 'issues',
    pathKeys: ['file'],
    totalKey: 'total_issues',
    foundStatus: 'issues_found',
  }),
  ruff: categorizedStrategy({
    categories: LINT_CATEGORIES,
    pathKeys: ['file'],
    categoryKey: 'category',
    tool: 'ruff',
  }),
};
