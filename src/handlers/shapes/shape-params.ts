/**
 * Parameter specs shared by create_shape and update_shape.
 */

import { type ParamSpecs } from '../../types';

export const SHAPE_TYPES = [
  'rectangle',
  'circle',
  'triangle',
  'star',
  'arrow',
  'rhombus',
  'octagon',
  'hexagon',
] as const;

export const STYLE_PARAMS = {
  fillColor: {
    type: 'string',
    description: 'Fill color in hex format (e.g., #FF0000)',
    required: false,
  },
  borderColor: {
    type: 'string',
    description: 'Border color in hex format (e.g., #000000)',
    required: false,
  },
  borderWidth: {
    type: 'number',
    description: 'Border width in pixels',
    required: false,
  },
  content: {
    type: 'string',
    description: 'Text content to display in the shape',
    required: false,
  },
} as const satisfies ParamSpecs;
