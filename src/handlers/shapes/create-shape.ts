/**
 * Handler for create_shape tool.
 *
 * Optional style and content arguments that are not supplied never reach
 * the request body.
 */

import { type ArgsOf, type ParamSpecs, type ToolContext, type ToolResult } from '../../types';
import { defineTool } from '../define-tool';
import { jsonResult } from '../helpers';
import { BOARD_ID } from '../params';
import { SHAPE_TYPES, STYLE_PARAMS } from './shape-params';

const PARAMS = {
  board_id: BOARD_ID,
  shape_type: {
    type: 'string',
    description: `Type of shape: ${SHAPE_TYPES.join(', ')}`,
    enum: SHAPE_TYPES,
    required: true,
  },
  x: { type: 'number', description: 'X coordinate of the shape position', required: true },
  y: { type: 'number', description: 'Y coordinate of the shape position', required: true },
  width: {
    type: 'number',
    description: 'Width of the shape',
    exclusiveMinimum: 0,
    required: true,
  },
  height: {
    type: 'number',
    description: 'Height of the shape',
    exclusiveMinimum: 0,
    required: true,
  },
  ...STYLE_PARAMS,
} as const satisfies ParamSpecs;

export type CreateShapeArgs = ArgsOf<typeof PARAMS>;

export async function handleCreateShape(
  args: CreateShapeArgs,
  { miro }: ToolContext
): Promise<ToolResult> {
  const shape = await miro.createShape(args.board_id, {
    shapeType: args.shape_type,
    x: args.x,
    y: args.y,
    width: args.width,
    height: args.height,
    fillColor: args.fillColor,
    borderColor: args.borderColor,
    borderWidth: args.borderWidth,
    content: args.content,
  });
  return jsonResult({ success: true, shape });
}

export const TOOL = defineTool({
  name: 'create_shape',
  description: 'Create a shape on a Miro board',
  params: PARAMS,
  handler: handleCreateShape,
});
