/**
 * Tests for the check command.
 */
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { fileURLToPath } from 'url';
import { join } from 'path';
import { tmpdir } from 'os';

// Mock chalk
vi.mock('chalk', () => ({
  default: {
    red: (s: string) => s,
    green: (s: string) => s,
    cyan: (s: string) => s,
    dim: (s: string) => s,
  },
}));

vi.mock('../../../../src/utils/logger.js', () => {
  const log = {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    setLevel: vi.fn(),
  };
  return { logger: { ...log, child: () => log } };
});

import { createCheckCommand } from '../../../../src/cli/commands/check.js';
import { logger } from '../../../../src/utils/logger.js';

const fixture = (name: string): string =>
  fileURLToPath(new URL(`../../../fixtures/declarations/${name}`, import.meta.url));

describe('check command', () => {
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let processExitSpy: MockInstance<typeof process.exit>;
  let processCwdSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    vi.clearAllMocks();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    processExitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
    processCwdSpy = vi.spyOn(process, 'cwd').mockReturnValue(join(tmpdir(), 'optbind-no-project'));
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    processExitSpy.mockRestore();
    processCwdSpy.mockRestore();
  });

  it('should create a command with correct name', () => {
    expect(createCheckCommand().name()).toBe('check');
  });

  it('should list the declared options', async () => {
    await createCheckCommand().parseAsync(['node', 'test', fixture('basic.yaml')]);

    expect(consoleLogSpy).toHaveBeenCalledWith(
      [
        'name  --name, -n  [single, next, required]',
        '    Who to greet',
        'count  --count  [single, next, default]',
        'level  --level  [single, scanningForValue]',
        'files  --files  [array, upToNextOption]',
        'verbose  --verbose, -v  [flag]',
        '',
        '5 options',
      ].join('\n')
    );
    expect(processExitSpy).not.toHaveBeenCalled();
  });

  it('should print summaries as JSON', async () => {
    await createCheckCommand().parseAsync(['node', 'test', fixture('basic.yaml'), '--json']);

    const printed = consoleLogSpy.mock.calls[0]?.[0];
    const parsed: unknown = typeof printed === 'string' ? JSON.parse(printed) : null;
    expect(parsed).toMatchObject({ options: [{ key: 'name' }, { key: 'count' }, { key: 'level' }, { key: 'files' }, { key: 'verbose' }] });
  });

  it('should log and exit on an invalid declaration file', async () => {
    await expect(
      createCheckCommand().parseAsync(['node', 'test', fixture('invalid.yaml')])
    ).rejects.toThrow('process.exit called');

    expect(processExitSpy).toHaveBeenCalledWith(1);
    expect(logger.error).toHaveBeenCalledWith(expect.stringContaining("parsing 'next' does not apply to arity 'array'"));
  });
});
