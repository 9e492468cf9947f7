/**
 * Registered tool modules, in registration order.
 */

import { type ToolModule } from '../module';
import { authModule } from './auth';
import { boardModule } from './board';
import { shapeModule } from './shape';
import { groupModule } from './group';

export const MODULES: readonly ToolModule[] = [authModule, boardModule, shapeModule, groupModule];

export { authModule, boardModule, shapeModule, groupModule };
