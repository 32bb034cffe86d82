import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import { createTempTestDir } from '@shkit/utils/test-helpers';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { findConfigPath, findConfigUp, loadConfig, loadConfigWithErrors } from '../../src/utils/config-loader.js';

describe('config-loader', () => {
  let testDir: string;
  let nestedDir: string;

  beforeEach(() => {
    testDir = createTempTestDir('shkit-cli-config-');
    nestedDir = join(testDir, 'a', 'b');
    mkdirSync(nestedDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  describe('findConfigUp', () => {
    it('should find the config in the start directory', () => {
      writeFileSync(join(testDir, 'shkit.config.yaml'), '');

      expect(findConfigUp(testDir)).toBe(testDir);
    });

    it('should walk up to a parent directory', () => {
      writeFileSync(join(testDir, 'shkit.config.yaml'), '');

      expect(findConfigUp(nestedDir)).toBe(testDir);
      expect(findConfigPath(nestedDir)).toBe(join(testDir, 'shkit.config.yaml'));
    });

    it('should prefer the nearest config', () => {
      writeFileSync(join(testDir, 'shkit.config.yaml'), '');
      writeFileSync(join(testDir, 'a', 'shkit.config.yaml'), '');

      expect(findConfigUp(nestedDir)).toBe(join(testDir, 'a'));
    });
  });

  describe('loadConfig', () => {
    it('should return defaults when no file is found', () => {
      const config = loadConfig(nestedDir);

      expect(config.logging).toEqual({ tag: 'shkit', level: 'info', syslog: false, facility: 'user' });
    });

    it('should resolve protected paths against the config directory', () => {
      writeFileSync(join(testDir, 'shkit.config.yaml'), 'remove:\n  protectedPaths: [data, /srv/keep]\n');

      expect(loadConfig(nestedDir).remove.protectedPaths).toEqual([join(testDir, 'data'), '/srv/keep']);
    });

    it('should throw for an invalid file', () => {
      writeFileSync(join(testDir, 'shkit.config.yaml'), 'unknown: true\n');

      expect(() => loadConfig(nestedDir)).toThrow();
    });
  });

  describe('loadConfigWithErrors', () => {
    it('should report no file as all nulls', () => {
      expect(loadConfigWithErrors(nestedDir)).toEqual({ config: null, errors: null, filePath: null });
    });

    it('should return validation errors with the file path', () => {
      writeFileSync(join(testDir, 'shkit.config.yaml'), 'dependencies:\n  commands: [""]\n');

      const result = loadConfigWithErrors(nestedDir);

      expect(result.config).toBeNull();
      expect(result.filePath).toBe(join(testDir, 'shkit.config.yaml'));
      expect(result.errors).toEqual(['dependencies.commands.0: Command name cannot be empty']);
    });

    it('should reject a document that is not a mapping', () => {
      writeFileSync(join(testDir, 'shkit.config.yaml'), '- a\n- b\n');

      expect(loadConfigWithErrors(testDir).errors).toEqual(['Configuration must be an object']);
    });

    it('should return the resolved config for a valid file', () => {
      writeFileSync(join(testDir, 'shkit.config.yaml'), 'logging:\n  tag: cron\n');

      const result = loadConfigWithErrors(testDir);

      expect(result.errors).toBeNull();
      expect(result.config?.logging.tag).toBe('cron');
    });
  });
});
