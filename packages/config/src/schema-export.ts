/**
 * JSON Schema Export for YAML Configuration
 *
 * Generates JSON Schema from the Zod configuration schema so editors can
 * validate and autocomplete shkit.config.yaml.
 */

import { zodToJsonSchema } from 'zod-to-json-schema';

import { ShkitConfigSchema } from './schema.js';

/**
 * Generate JSON Schema from Zod config schema
 *
 * Reference it from YAML with the $schema property:
 * ```yaml
 * $schema: ./shkit.schema.json
 * dependencies:
 *   commands: [git]
 * ```
 *
 * @returns JSON Schema object
 */
export function generateJsonSchema(): object {
  return zodToJsonSchema(ShkitConfigSchema, {
    name: 'ShkitConfig',
    $refStrategy: 'none',
    target: 'jsonSchema7',
  });
}
