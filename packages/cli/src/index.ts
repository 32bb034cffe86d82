/**
 * @shkit/cli
 *
 * Programmatic access to the shkit command-line program.
 *
 * @package @shkit/cli
 */

export { createProgram, readVersion } from './program.js';
export { findConfigUp, findConfigPath, loadConfig, loadConfigWithErrors } from './utils/config-loader.js';
