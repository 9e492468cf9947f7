/**
 * Handler for exchange_auth_code tool.
 */

import { type ArgsOf, type ParamSpecs, type ToolContext, type ToolResult } from '../../types';
import { defineTool } from '../define-tool';
import { jsonResult } from '../helpers';

const PARAMS = {
  code: {
    type: 'string',
    description: 'The authorization code received from the Miro OAuth callback',
    required: true,
  },
} as const satisfies ParamSpecs;

export type ExchangeAuthCodeArgs = ArgsOf<typeof PARAMS>;

export async function handleExchangeAuthCode(
  args: ExchangeAuthCodeArgs,
  { miro }: ToolContext
): Promise<ToolResult> {
  await miro.exchangeCodeForToken(args.code);
  return jsonResult({
    success: true,
    message: 'Successfully authenticated with Miro',
  });
}

export const TOOL = defineTool({
  name: 'exchange_auth_code',
  description: 'Exchange an authorization code for an access token',
  params: PARAMS,
  handler: handleExchangeAuthCode,
});
