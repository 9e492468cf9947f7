/**
 * Handler for delete_shape tool.
 */

import { type ArgsOf, type ParamSpecs, type ToolContext, type ToolResult } from '../../types';
import { defineTool } from '../define-tool';
import { jsonResult } from '../helpers';
import { BOARD_ID } from '../params';

const PARAMS = {
  board_id: BOARD_ID,
  item_id: { type: 'string', description: 'The ID of the shape item to delete', required: true },
} as const satisfies ParamSpecs;

export type DeleteShapeArgs = ArgsOf<typeof PARAMS>;

export async function handleDeleteShape(
  args: DeleteShapeArgs,
  { miro }: ToolContext
): Promise<ToolResult> {
  await miro.deleteShape(args.board_id, args.item_id);
  return jsonResult({
    success: true,
    message: `Shape ${args.item_id} deleted successfully`,
  });
}

export const TOOL = defineTool({
  name: 'delete_shape',
  description: 'Delete a shape from a board',
  params: PARAMS,
  handler: handleDeleteShape,
});
