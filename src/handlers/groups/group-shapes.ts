/**
 * Handler for group_shapes tool.
 *
 * Miro has no group primitive in its REST API, so a group is a frame
 * sized to the items' bounding box with the items re-parented into it.
 */

import { type ArgsOf, type ParamSpecs, type ToolContext, type ToolResult } from '../../types';
import { invalidParamsError } from '../../errors';
import { defineTool } from '../define-tool';
import { jsonResult } from '../helpers';
import { BOARD_ID } from '../params';

const PARAMS = {
  board_id: BOARD_ID,
  item_ids: {
    type: 'array',
    description: 'List of item IDs to group together (at least 2)',
    minItems: 2,
    required: true,
  },
} as const satisfies ParamSpecs;

export type GroupShapesArgs = ArgsOf<typeof PARAMS>;

export async function handleGroupShapes(
  args: GroupShapesArgs,
  { miro }: ToolContext
): Promise<ToolResult> {
  const { board_id, item_ids } = args;
  if (new Set(item_ids).size !== item_ids.length) {
    throw invalidParamsError('item_ids must not contain duplicates');
  }

  const group = await miro.groupItems(board_id, item_ids);
  return jsonResult({
    success: true,
    group,
    message: `Successfully grouped ${item_ids.length} shapes`,
  });
}

export const TOOL = defineTool({
  name: 'group_shapes',
  description: 'Group multiple shapes together on a board',
  params: PARAMS,
  handler: handleGroupShapes,
});
