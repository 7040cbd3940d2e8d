/**
 * Tests for the CLI program.
 */
import { describe, it, expect } from 'vitest';
import { createCli } from '../../../src/cli/index.js';

describe('createCli', () => {
  it('should register the commands', () => {
    const program = createCli();

    expect(program.name()).toBe('optbind');
    expect(program.commands.map((command) => command.name())).toEqual(['resolve', 'check']);
  });

  it('should report the package version', () => {
    expect(createCli().version()).toBe('0.1.0');
  });
});
