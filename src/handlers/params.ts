/** Parameter specs shared by several tools. */

import { type ParamSpec } from '../types';

export const BOARD_ID = {
  type: 'string',
  description: 'The ID of the board',
  required: true,
} as const satisfies ParamSpec;
