import { type ToolModule } from '../module';
import { TOOL as CREATE_SHAPE } from '../handlers/shapes/create-shape';
import { TOOL as UPDATE_SHAPE } from '../handlers/shapes/update-shape';
import { TOOL as DELETE_SHAPE } from '../handlers/shapes/delete-shape';

export const shapeModule: ToolModule = {
  name: 'shape',
  tools: [CREATE_SHAPE, UPDATE_SHAPE, DELETE_SHAPE],
};
