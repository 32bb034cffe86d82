/**
 * TypeScript-First Config Helper
 *
 * Type-checks a configuration object written in TypeScript.
 */

import type { ShkitConfig } from './schema.js';

/**
 * Define a shkit configuration
 *
 * Performs no runtime operations - just returns the config object.
 *
 * @example
 * ```typescript
 * import { defineConfig } from '@shkit/config';
 *
 * export default defineConfig({
 *   dependencies: { commands: ['rsync', 'logger'] },
 *   logging: { tag: 'nightly-backup', syslog: true },
 * });
 * ```
 */
export function defineConfig(config: ShkitConfig): ShkitConfig {
  return config;
}
