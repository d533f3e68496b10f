/* src/runner/util/debug-scopes.ts
 * Centralized labels for debugFallback notices.
 * Tests reference these exact tokens in expectations.
 */

/** registry store: unreadable or unparsable data file */
export const DBG_SCOPE_REGISTRY_LOAD = 'registry.store:load';

/** registry store: individual entries dropped during validation */
export const DBG_SCOPE_REGISTRY_ENTRY = 'registry.store:entry';

/** config loader: no config file found in the home directory */
export const DBG_SCOPE_CONFIG_DEFAULTS = 'cli.config:defaults';

/** script runner: spawn failure or signal exit reported as informational */
export const DBG_SCOPE_EXEC_RESULT = 'exec.run-script:result';
