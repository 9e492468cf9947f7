import { type ToolModule } from '../module';
import { TOOL as GROUP_SHAPES } from '../handlers/groups/group-shapes';
import { TOOL as UNGROUP_SHAPES } from '../handlers/groups/ungroup-shapes';

export const groupModule: ToolModule = {
  name: 'group',
  tools: [GROUP_SHAPES, UNGROUP_SHAPES],
};
