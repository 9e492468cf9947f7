/**
 * Shared interfaces used across the miro-mcp server.
 */

import type { MiroClient } from './miro-client';
import type { CredentialStore } from './credentials';

/** Shape of the JSON returned by tool handlers that wrap results. */
export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
}

// ── Parameter descriptors ──────────────────────────────────────────────────

interface ParamBase {
  description: string;
  required: boolean;
}

export interface StringParam extends ParamBase {
  type: 'string';
  enum?: readonly string[];
}

export interface NumberParam extends ParamBase {
  type: 'number';
  /** Values must be strictly greater than this bound. */
  exclusiveMinimum?: number;
}

export interface StringArrayParam extends ParamBase {
  type: 'array';
  minItems?: number;
}

/** Declared type of a single tool argument, tagged by `type`. */
export type ParamSpec = StringParam | NumberParam | StringArrayParam;

export type ParamSpecs = Record<string, ParamSpec>;

type ParamValue<S extends ParamSpec> = S extends { enum: readonly (infer E)[] }
  ? E
  : S extends StringParam
    ? string
    : S extends NumberParam
      ? number
      : string[];

type RequiredKeys<P extends ParamSpecs> = {
  [K in keyof P]: P[K]['required'] extends true ? K : never;
}[keyof P];

type OptionalKeys<P extends ParamSpecs> = Exclude<keyof P, RequiredKeys<P>>;

/** Validated argument object a handler receives for parameter specs `P`. */
export type ArgsOf<P extends ParamSpecs> = {
  [K in RequiredKeys<P>]: ParamValue<P[K]>;
} & {
  [K in OptionalKeys<P>]?: ParamValue<P[K]>;
};

/** JSON Schema advertised for a tool in `tools/list`. */
export interface InputSchema {
  [key: string]: unknown;
  type: 'object';
  properties: Record<string, Record<string, unknown>>;
  required: string[];
}

/** Tool entry as listed to MCP clients. */
export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: InputSchema;
}

// ── Tool execution context ─────────────────────────────────────────────────

/**
 * Session state threaded through dispatch into handlers.
 *
 * One context exists per server connection; handlers never reach for
 * process-wide credentials.
 */
export interface ToolContext {
  credentials: CredentialStore;
  miro: MiroClient;
}

/** A registered tool: its definition, parameter specs and invoker. */
export interface ToolDescriptor {
  readonly definition: ToolDefinition;
  readonly params: ParamSpecs;
  /** Validate raw arguments against `params`, then run the handler. */
  run(args: unknown, context: ToolContext): Promise<ToolResult>;
}
