/**
 * Generic tool-module interface.
 *
 * Each capability area (auth, board, shapes, groups) implements this
 * interface to contribute its tools.  The server entry point registers the
 * modules into a ToolRegistry in a fixed order, which is the order tools
 * appear in `tools/list`.
 */

import { type ToolDescriptor } from './types';

/** A pluggable module that contributes MCP tools. */
export interface ToolModule {
  /** Human-readable module name (e.g. "auth", "shape"). */
  readonly name: string;

  /** Tools contributed by this module, in listing order. */
  readonly tools: readonly ToolDescriptor[];
}
