import { describe, expect, it } from 'vitest';

import { defineConfig } from '../../src/config/define-config';

describe('defineConfig', () => {
  it('accepts a partial config with numeric project ids', () => {
    const config = defineConfig({
      todoistProjectId: 12345,
      exportPath: 'docs/ROADMAP.md',
      rateLimit: { calls: 1 },
    });
    expect(config.todoistProjectId).toBe(12345);
  });

  it('rejects unknown keys at compile time', () => {
    defineConfig({
      // @ts-expect-error extra keys should be rejected
      extra: true,
    });
    expect(true).toBe(true);
  });
});
