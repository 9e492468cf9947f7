/**
 * Handler for get_auth_url tool.
 *
 * Starts the OAuth flow: returns the authorize URL the user must open.
 * Needs no token.
 */

import { type ArgsOf, type ParamSpecs, type ToolContext, type ToolResult } from '../../types';
import { defineTool } from '../define-tool';
import { jsonResult } from '../helpers';

const PARAMS = {} as const satisfies ParamSpecs;

export async function handleGetAuthUrl(
  _args: ArgsOf<typeof PARAMS>,
  { credentials }: ToolContext
): Promise<ToolResult> {
  return jsonResult({
    success: true,
    auth_url: credentials.buildAuthorizationUrl(),
    message:
      'Visit this URL to authorize the application, then use exchange_auth_code ' +
      'with the code from the callback',
  });
}

export const TOOL = defineTool({
  name: 'get_auth_url',
  description: 'Get the OAuth 2.0 authorization URL to authenticate with Miro',
  params: PARAMS,
  handler: handleGetAuthUrl,
});
