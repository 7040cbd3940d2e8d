/**
 * Tests for the resolve command.
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

import { createResolveCommand, pickFormat } from '../../../../src/cli/commands/resolve.js';
import { logger } from '../../../../src/utils/logger.js';

const fixture = (name: string): string =>
  fileURLToPath(new URL(`../../../fixtures/declarations/${name}`, import.meta.url));

describe('resolve command', () => {
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let processExitSpy: MockInstance<typeof process.exit>;
  let processCwdSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    vi.clearAllMocks();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    processExitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
    // No .optbind/config.yaml here, so defaults apply.
    processCwdSpy = vi.spyOn(process, 'cwd').mockReturnValue(join(tmpdir(), 'optbind-no-project'));
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    processExitSpy.mockRestore();
    processCwdSpy.mockRestore();
  });

  describe('createResolveCommand', () => {
    it('should create a command with correct name', () => {
      expect(createResolveCommand().name()).toBe('resolve');
    });

    it('should take a declaration file and variadic tokens', () => {
      const args = createResolveCommand().registeredArguments;

      expect(args.map((arg) => arg.name())).toEqual(['declarations', 'tokens']);
      expect(args[0]?.required).toBe(true);
      expect(args[1]?.variadic).toBe(true);
    });

    it('should have output options', () => {
      const optionNames = createResolveCommand().options.map((opt) => opt.long);

      expect(optionNames).toEqual(['--config', '--json', '--format', '--no-color', '--log-level']);
    });
  });

  describe('command execution', () => {
    it('should print resolved values', async () => {
      await createResolveCommand().parseAsync(['node', 'test', fixture('basic.yaml'), '--', '--name', 'Ada']);

      expect(consoleLogSpy).toHaveBeenCalledWith(
        [
          '✓ RESOLVED',
          '   name    = "Ada"',
          '   count   = 3',
          '   level   = (unset)',
          '   files   = []',
          '   verbose = false',
        ].join('\n')
      );
      expect(processExitSpy).not.toHaveBeenCalled();
      expect(logger.setLevel).toHaveBeenCalledWith('info');
    });

    it('should print errors as JSON and exit with 1 when resolution fails', async () => {
      await expect(
        createResolveCommand().parseAsync(['node', 'test', fixture('basic.yaml'), '--json', '--', '-v', '--bogus'])
      ).rejects.toThrow('process.exit called');

      expect(processExitSpy).toHaveBeenCalledWith(1);
      const printed = consoleLogSpy.mock.calls[0]?.[0];
      expect(typeof printed === 'string' && JSON.parse(printed)).toEqual({
        ok: false,
        errors: [
          {
            code: 'R002',
            message: "Unknown option '--bogus' at position 1",
            kind: 'UnrecognizedOption',
            names: [],
            token: '--bogus',
            position: 1,
          },
          {
            code: 'R006',
            message: "Missing required option '--name'",
            kind: 'MissingRequired',
            key: 'name',
            names: ['--name', '-n'],
          },
        ],
      });
    });

    it('should log and exit when the declarations cannot be loaded', async () => {
      await expect(
        createResolveCommand().parseAsync(['node', 'test', fixture('missing.yaml')])
      ).rejects.toThrow('process.exit called');

      expect(logger.error).toHaveBeenCalledWith(`Failed to load YAML file: ${fixture('missing.yaml')}`);
      expect(consoleLogSpy).not.toHaveBeenCalled();
    });

    it('should take the log level from the command line', async () => {
      await createResolveCommand().parseAsync([
        'node',
        'test',
        fixture('basic.yaml'),
        '--log-level',
        'debug',
        '--',
        '--name',
        'Ada',
      ]);

      expect(logger.setLevel).toHaveBeenCalledWith('debug');
    });
  });

  describe('pickFormat', () => {
    it('should prefer --json, then --format, then config', () => {
      expect(pickFormat({ json: true, format: 'human' }, 'human')).toBe('json');
      expect(pickFormat({ format: 'json' }, 'human')).toBe('json');
      expect(pickFormat({}, 'json')).toBe('json');
      expect(pickFormat({}, 'human')).toBe('human');
    });

    it('should reject an unknown format', () => {
      expect(() => pickFormat({ format: 'xml' }, 'human')).toThrow();
    });
  });
});
