import { describe, it, expect } from 'vitest';
import { createServeCommand, resolveApiKey } from '../../../src/cli/commands/serve.js';

describe('serve command', () => {
  it('declares its options', () => {
    const flags = createServeCommand().options.map((o) => o.long);
    expect(flags).toEqual(['--port', '--host', '--db', '--generate-key']);
  });

  describe('resolveApiKey', () => {
    it('keeps a configured key', () => {
      expect(resolveApiKey('test-secret', true)).toEqual({ apiKey: 'test-secret', generated: false });
    });

    it('generates a key on request', () => {
      const { apiKey, generated } = resolveApiKey(undefined, true);
      expect(generated).toBe(true);
      expect(apiKey).toMatch(/^cad_[A-Za-z0-9_-]{32}$/);
    });

    it('runs without a key otherwise', () => {
      expect(resolveApiKey(undefined, false)).toEqual({ generated: false });
    });
  });
});
