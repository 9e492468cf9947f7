/**
 * Routes a CallTool request to the registered tool.
 *
 * Arguments are validated against the tool's parameter specs before the
 * handler runs.  Errors raised as McpError keep their code; anything else
 * becomes an InternalError naming the tool.
 */

import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import { type ToolContext, type ToolResult } from './types';
import { type ToolRegistry } from './registry';
import { debug } from './logger';

export async function dispatchToolCall(
  registry: ToolRegistry,
  name: string,
  args: unknown,
  context: ToolContext
): Promise<ToolResult> {
  const tool = registry.get(name);
  const started = Date.now();

  try {
    const result = await tool.run(args, context);
    debug(`${name} completed in ${Date.now() - started}ms`);
    return result;
  } catch (error: unknown) {
    debug(`${name} failed after ${Date.now() - started}ms:`, error);
    if (error instanceof McpError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new McpError(ErrorCode.InternalError, `Error executing ${name}: ${message}`);
  }
}
