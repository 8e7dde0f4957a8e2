/**
 * Tests for ToolRegistry
 */

import { describe, it, expect } from 'vitest';
import { ToolRegistry, type ToolDefinition } from '../tool-registry.js';
import { findingListStrategy } from '../reducers.js';
import { ConfigError, ValidationError } from '../../utils/errors.js';

const strategy = findingListStrategy({ listKey: 'issues', pathKeys: ['file'], totalKey: 'total', foundStatus: 'found' });

const lint: ToolDefinition = { kind: 'file-decomposable', name: 'lint', analyze: async () => ({}), strategy };
const deps: ToolDefinition = {
  kind: 'whole-project',
  name: 'deps',
  analyze: async () => ({}),
  patterns: ['package.json'],
};

describe('ToolRegistry', () => {
  it('should register and look up tools', () => {
    const registry = new ToolRegistry([lint, deps]);

    expect(registry.names()).toEqual(['lint', 'deps']);
    expect(registry.get('deps')).toBe(deps);
    expect(registry.has('lint')).toBe(true);
    expect(registry.list()).toHaveLength(2);
  });

  it('should reject duplicate names', () => {
    const registry = new ToolRegistry([lint]);

    expect(() => registry.register({ ...deps, name: 'lint' })).toThrow(ConfigError);
  });

  it('should reject unsafe names', () => {
    expect(() => new ToolRegistry([{ ...deps, name: 'a/b' }])).toThrow(ValidationError);
  });

  it('should reject unknown tools with the registered names as a hint', () => {
    const registry = new ToolRegistry([lint]);

    expect(() => registry.get('typing')).toThrow('Unknown tool "typing"');
    try {
      registry.get('typing');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({ recoveryHint: 'Registered tools: lint' });
    }
  });

  it('should expose strategies of file-decomposable tools only', () => {
    const registry = new ToolRegistry([lint, deps]);

    expect(Object.keys(registry.strategies())).toEqual(['lint']);
    expect(registry.strategies().lint).toBe(strategy);
  });
});
