/**
 * Debug logging
 *
 * Activated by WAYLINE_DEBUG=1 (or `--debug` on the CLI).
 * Engine passes log their candidate lists and housekeeping counts here.
 */

/**
 * Check if debug mode is enabled
 */
export function isDebugEnabled(): boolean {
  return process.env['WAYLINE_DEBUG'] === '1';
}

export function debugLog(scope: string, message: string): void {
  if (!isDebugEnabled()) return;
  console.debug(`[${scope}] ${message}`);
}
