/**
 * YAML Output Utilities
 *
 * Machine-facing command output: one YAML document framed by `---` lines.
 *
 * @package @shkit/cli
 */

import { stringify as stringifyYaml } from 'yaml';

/**
 * Output a result as YAML to stdout and wait for stdout to drain
 *
 * @example
 * ```typescript
 * await outputYamlResult({ ok: false, missing: ['jq'], found: {} });
 * ```
 */
export async function outputYamlResult(result: unknown): Promise<void> {
  process.stdout.write('---\n');

  const yaml = stringifyYaml(result);
  process.stdout.write(yaml);

  if (!yaml.endsWith('\n')) {
    process.stdout.write('\n');
  }
  process.stdout.write('---\n');

  // Wait for stdout to flush before the caller exits
  await new Promise<void>(resolve => {
    if (process.stdout.write('')) {
      resolve();
    } else {
      process.stdout.once('drain', resolve);
    }
  });
}
