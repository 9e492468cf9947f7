/**
 * Shared helpers used by individual tool handler modules.
 */

import { type ToolResult } from '../types';

/** Wrap a payload as pretty-printed JSON text content. */
export function jsonResult(data: Record<string, unknown>): ToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(data, null, 2) }],
  };
}
