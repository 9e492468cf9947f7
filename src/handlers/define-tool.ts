/**
 * Tool descriptor construction.
 *
 * A tool is declared once as parameter specs plus a handler; the JSON
 * Schema advertised in `tools/list` and the handler's argument type are
 * both derived from the specs, so the two cannot drift apart.
 */

import {
  type ArgsOf,
  type InputSchema,
  type ParamSpecs,
  type ToolContext,
  type ToolDescriptor,
  type ToolResult,
} from '../types';
import { parseArgs } from './validation';

export type ToolHandler<P extends ParamSpecs> = (
  args: ArgsOf<P>,
  context: ToolContext
) => Promise<ToolResult>;

export interface ToolSpec<P extends ParamSpecs> {
  name: string;
  description: string;
  params: P;
  handler: ToolHandler<P>;
}

export function buildInputSchema(params: ParamSpecs): InputSchema {
  const properties: InputSchema['properties'] = {};
  for (const [key, spec] of Object.entries(params)) {
    const property: Record<string, unknown> = { type: spec.type, description: spec.description };
    switch (spec.type) {
      case 'string':
        if (spec.enum) property.enum = [...spec.enum];
        break;
      case 'number':
        if (spec.exclusiveMinimum !== undefined) property.exclusiveMinimum = spec.exclusiveMinimum;
        break;
      case 'array':
        property.items = { type: 'string' };
        if (spec.minItems !== undefined) property.minItems = spec.minItems;
        break;
    }
    properties[key] = property;
  }

  return {
    type: 'object',
    properties,
    required: Object.entries(params)
      .filter(([, spec]) => spec.required)
      .map(([key]) => key),
  };
}

export function defineTool<const P extends ParamSpecs>(spec: ToolSpec<P>): ToolDescriptor {
  return {
    definition: {
      name: spec.name,
      description: spec.description,
      inputSchema: buildInputSchema(spec.params),
    },
    params: spec.params,
    run: (args, context) => spec.handler(parseArgs(spec.params, args), context),
  };
}
