/**
 * Tests for the config schema.
 */
import { describe, it, expect } from 'vitest';
import { ConfigSchema, EngineConfigSchema } from '../../../../src/core/config/schema.js';

describe('ConfigSchema', () => {
  it('should treat null sections as missing', () => {
    const config = ConfigSchema.parse({ engine: null, output: null });

    expect(config.engine.terminator).toBe('--');
    expect(config.output.format).toBe('human');
  });

  it('should reject an unknown output format', () => {
    expect(ConfigSchema.safeParse({ output: { format: 'xml' } }).success).toBe(false);
  });

  it('should reject an unknown log level', () => {
    expect(ConfigSchema.safeParse({ log_level: 'loud' }).success).toBe(false);
  });
});

describe('EngineConfigSchema', () => {
  it('should allow disabling the terminator', () => {
    expect(EngineConfigSchema.parse({ terminator: null }).terminator).toBeNull();
  });

  it('should reject an empty terminator', () => {
    expect(EngineConfigSchema.safeParse({ terminator: '' }).success).toBe(false);
  });

  it('should require at least one option prefix', () => {
    expect(EngineConfigSchema.safeParse({ option_prefixes: [] }).success).toBe(false);
  });
});
