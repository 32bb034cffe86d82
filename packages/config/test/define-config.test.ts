/**
 * Tests for TypeScript-First Config Helper
 */

import { describe, it, expect } from 'vitest';

import { defineConfig } from '../src/define-config.js';
import { validateConfig, type ShkitConfig } from '../src/schema.js';

describe('defineConfig', () => {
  it('should return the same config object', () => {
    const config: ShkitConfig = {
      dependencies: { commands: ['rsync'] },
      logging: { tag: 'backup', syslog: true },
    };

    const result = defineConfig(config);
    expect(result).toBe(config);
  });

  it('should produce configs that pass validation', () => {
    const config = defineConfig({
      logging: { level: 'debug', facility: 'local7' },
      remove: { protectedPaths: ['/srv'] },
    });

    const validated = validateConfig(config);
    expect(validated.logging.level).toBe('debug');
    expect(validated.logging.facility).toBe('local7');
    expect(validated.dependencies.commands).toEqual([]);
  });
});
