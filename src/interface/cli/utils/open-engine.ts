/**
 * Engine access for CLI commands
 */

import { createLineageEngine, type LineageEngine } from '../../../core/engine.js';
import { resolveConfigPath } from '../../../config/config.js';
import { ConfigNotFoundError } from '../../../shared/errors.js';
import { logLevelFor, type GlobalOptions } from './global-options.js';

/**
 * Open the project under --cwd, run `fn` and close the engine again.
 * Fails with ConfigNotFoundError when `lineage init` has not been run.
 */
export async function withEngine<T>(
  globals: GlobalOptions,
  fn: (engine: LineageEngine) => T | Promise<T>,
): Promise<T> {
  const engine = createLineageEngine(globals.cwd, { logLevel: logLevelFor(globals) });
  try {
    if (!engine.initialized) {
      throw new ConfigNotFoundError(resolveConfigPath(globals.cwd));
    }
    return await fn(engine);
  } finally {
    engine.close();
  }
}
