/**
 * Handler for update_shape tool.
 *
 * Partial update: only the arguments supplied are sent, so a call with
 * just `content` leaves position, size and style untouched.
 */

import { type ArgsOf, type ParamSpecs, type ToolContext, type ToolResult } from '../../types';
import { invalidParamsError } from '../../errors';
import { buildUpdateShapePayload } from '../../miro-client';
import { defineTool } from '../define-tool';
import { jsonResult } from '../helpers';
import { BOARD_ID } from '../params';
import { STYLE_PARAMS } from './shape-params';

const PARAMS = {
  board_id: BOARD_ID,
  item_id: { type: 'string', description: 'The ID of the shape item to update', required: true },
  x: { type: 'number', description: 'New X coordinate (optional)', required: false },
  y: { type: 'number', description: 'New Y coordinate (optional)', required: false },
  width: {
    type: 'number',
    description: 'New width (optional)',
    exclusiveMinimum: 0,
    required: false,
  },
  height: {
    type: 'number',
    description: 'New height (optional)',
    exclusiveMinimum: 0,
    required: false,
  },
  ...STYLE_PARAMS,
} as const satisfies ParamSpecs;

export type UpdateShapeArgs = ArgsOf<typeof PARAMS>;

const UPDATABLE = [
  'x',
  'y',
  'width',
  'height',
  'fillColor',
  'borderColor',
  'borderWidth',
  'content',
] as const;

export async function handleUpdateShape(
  args: UpdateShapeArgs,
  { miro }: ToolContext
): Promise<ToolResult> {
  const { board_id, item_id, ...changes } = args;
  // Blank colors are dropped from the body, so they do not count as a change
  if (Object.keys(buildUpdateShapePayload(changes)).length === 0) {
    throw invalidParamsError(`Provide at least one of: ${UPDATABLE.join(', ')}`);
  }

  const shape = await miro.updateShape(board_id, item_id, changes);
  return jsonResult({ success: true, shape });
}

export const TOOL = defineTool({
  name: 'update_shape',
  description: 'Update properties of an existing shape',
  params: PARAMS,
  handler: handleUpdateShape,
});
