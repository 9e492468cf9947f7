import { type ToolModule } from '../module';
import { TOOL as GET_AUTH_URL } from '../handlers/auth/get-auth-url';
import { TOOL as EXCHANGE_AUTH_CODE } from '../handlers/auth/exchange-auth-code';

export const authModule: ToolModule = {
  name: 'auth',
  tools: [GET_AUTH_URL, EXCHANGE_AUTH_CODE],
};
