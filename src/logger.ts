/**
 * stderr logging.  stdout belongs to the JSON-RPC stream, so nothing here
 * may ever write to it.
 *
 * `debug` output is only emitted when `MIRO_MCP_DEBUG` is `'1'` or `'true'`.
 */

/** Checked once at module load time. */
const DEBUG_ENABLED: boolean =
  process.env['MIRO_MCP_DEBUG'] === '1' || process.env['MIRO_MCP_DEBUG'] === 'true';

export function log(message: string, ...details: unknown[]): void {
  console.error(`[miro-mcp] ${message}`, ...details);
}

export function debug(message: string, ...details: unknown[]): void {
  if (!DEBUG_ENABLED) return;
  console.error(`[miro-mcp:debug] ${message}`, ...details);
}
