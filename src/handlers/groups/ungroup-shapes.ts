/**
 * Handler for ungroup_shapes tool.
 */

import { type ArgsOf, type ParamSpecs, type ToolContext, type ToolResult } from '../../types';
import { defineTool } from '../define-tool';
import { jsonResult } from '../helpers';
import { BOARD_ID } from '../params';

const PARAMS = {
  board_id: BOARD_ID,
  group_id: {
    type: 'string',
    description: 'The ID of the group/frame to ungroup',
    required: true,
  },
} as const satisfies ParamSpecs;

export type UngroupShapesArgs = ArgsOf<typeof PARAMS>;

export async function handleUngroupShapes(
  args: UngroupShapesArgs,
  { miro }: ToolContext
): Promise<ToolResult> {
  const { detachedIds } = await miro.ungroupItems(args.board_id, args.group_id);
  return jsonResult({
    success: true,
    detachedIds,
    message: `Ungrouped ${detachedIds.length} items`,
  });
}

export const TOOL = defineTool({
  name: 'ungroup_shapes',
  description: 'Ungroup shapes by removing them from a group/frame and deleting the frame',
  params: PARAMS,
  handler: handleUngroupShapes,
});
