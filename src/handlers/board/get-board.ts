/**
 * Handler for get_board tool.
 */

import { type ArgsOf, type ParamSpecs, type ToolContext, type ToolResult } from '../../types';
import { defineTool } from '../define-tool';
import { jsonResult } from '../helpers';
import { BOARD_ID } from '../params';

const PARAMS = {
  board_id: BOARD_ID,
} as const satisfies ParamSpecs;

export type GetBoardArgs = ArgsOf<typeof PARAMS>;

export async function handleGetBoard(
  args: GetBoardArgs,
  { miro }: ToolContext
): Promise<ToolResult> {
  const board = await miro.getBoard(args.board_id);
  return jsonResult({ success: true, board });
}

export const TOOL = defineTool({
  name: 'get_board',
  description:
    'Get information about a Miro board including metadata, name, description, and settings',
  params: PARAMS,
  handler: handleGetBoard,
});
