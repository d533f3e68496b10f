/* src/runner/util/debug.ts
 * Opt-in debug logger for recovered/fallback paths.
 * Emits only when SHELF_DEBUG=1.
 */

const on = (): boolean => process.env.SHELF_DEBUG === '1';

/** Log a concise fallback notice under SHELF_DEBUG=1 (scope: module:function). */
export const debugFallback = (scope: string, reason: string): void => {
  if (!on()) return;
  // stderr keeps debug noise apart from list/help output
  console.error(`shelf: debug: fallback: ${scope}: ${reason}`);
};
