/**
 * Tests for command-backed analysis tools
 */

import { describe, it, expect } from 'vitest';
import { tmpdir } from 'node:os';
import { createCommandTool, mergeJsonPayloads } from '../command-tool.js';
import { Logger } from '../../utils/logger.js';
import { ToolExecutionError } from '../../utils/errors.js';
import type { JsonValue } from '../../cache/types.js';

const node = process.execPath;
const projectRoot = tmpdir();
const logger = new Logger({ enableConsole: false });

/** Echoes its file arguments as {"files": [...], "runs": 1} */
const ECHO_FILES = 'process.stdout.write(JSON.stringify({ files: process.argv.slice(1), runs: 1 }))';

const parseJson = (stdout: string): JsonValue => {
  const parsed: JsonValue = JSON.parse(stdout);
  return parsed;
};

describe('createCommandTool', () => {
  it('should run once over the whole project without a file subset', async () => {
    const analyze = createCommandTool({ tool: 'echo', command: node, args: ['-e', ECHO_FILES], parse: parseJson, logger });

    const payload = await analyze({ projectRoot, signal: new AbortController().signal });

    expect(payload).toEqual({ files: [], runs: 1 });
  });

  it('should return the empty payload for an empty subset', async () => {
    const analyze = createCommandTool({
      tool: 'echo',
      command: node,
      args: ['-e', ECHO_FILES],
      parse: parseJson,
      emptyPayload: { files: [] },
      logger,
    });

    expect(await analyze({ projectRoot, files: [], signal: new AbortController().signal })).toEqual({ files: [] });
  });

  it('should split long file lists into chunks and merge the payloads', async () => {
    const analyze = createCommandTool({
      tool: 'echo',
      command: node,
      args: ['-e', ECHO_FILES],
      parse: parseJson,
      chunkSize: 2,
      logger,
    });

    const payload = await analyze({
      projectRoot,
      files: ['a.ts', 'b.ts', 'c.ts', 'd.ts', 'e.ts'],
      signal: new AbortController().signal,
    });

    expect(payload).toEqual({ files: ['a.ts', 'b.ts', 'c.ts', 'd.ts', 'e.ts'], runs: 3 });
  });

  it('should accept configured non-zero exit codes', async () => {
    const analyze = createCommandTool({
      tool: 'finder',
      command: node,
      args: ['-e', 'process.stdout.write("{\\"found\\":true}"); process.exit(1)'],
      parse: parseJson,
      acceptExitCodes: [0, 1],
      logger,
    });

    expect(await analyze({ projectRoot, signal: new AbortController().signal })).toEqual({ found: true });
  });

  it('should fail on an unexpected exit code', async () => {
    const analyze = createCommandTool({
      tool: 'crasher',
      command: node,
      args: ['-e', 'process.stderr.write("bad config"); process.exit(2)'],
      parse: parseJson,
      logger,
    });

    const error = await analyze({ projectRoot, signal: new AbortController().signal }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ToolExecutionError);
    expect(error).toMatchObject({ exitCode: 2, details: { stderr: 'bad config' } });
  });

  it('should fail when the output cannot be parsed', async () => {
    const analyze = createCommandTool({
      tool: 'garbled',
      command: node,
      args: ['-e', 'process.stdout.write("not json")'],
      parse: parseJson,
      logger,
    });

    await expect(analyze({ projectRoot, signal: new AbortController().signal })).rejects.toThrow(
      'Could not parse garbled output'
    );
  });
});

describe('mergeJsonPayloads', () => {
  it('should concatenate arrays and sum numbers', () => {
    expect(
      mergeJsonPayloads([
        { issues: [1], total: 1, meta: { a: 1 }, tool: 'x' },
        { issues: [2, 3], total: 2, meta: { b: 2 }, tool: 'y' },
      ])
    ).toEqual({ issues: [1, 2, 3], total: 3, meta: { a: 1, b: 2 }, tool: 'y' });
  });

  it('should flatten top-level arrays', () => {
    expect(mergeJsonPayloads([[1], [2]])).toEqual([1, 2]);
  });

  it('should return an empty object for no payloads', () => {
    expect(mergeJsonPayloads([])).toEqual({});
  });
});
