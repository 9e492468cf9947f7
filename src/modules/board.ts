import { type ToolModule } from '../module';
import { TOOL as GET_BOARD } from '../handlers/board/get-board';

export const boardModule: ToolModule = {
  name: 'board',
  tools: [GET_BOARD],
};
