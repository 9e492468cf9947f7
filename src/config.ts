/**
 * Environment configuration, read once at startup.
 */

export const DEFAULT_REDIRECT_URL = 'http://localhost:8080/callback';
export const DEFAULT_API_BASE_URL = 'https://api.miro.com';
export const DEFAULT_AUTH_BASE_URL = 'https://miro.com';

export interface MiroConfig {
  clientId: string;
  clientSecret: string;
  redirectUrl: string;
  /** Base of the REST API, without trailing slash. */
  apiBaseUrl: string;
  /** Base of the browser-facing OAuth authorize page. */
  authBaseUrl: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

function read(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function requireVar(env: Env, key: string): string {
  const value = read(env, key);
  if (!value) {
    throw new ConfigError(`${key} environment variable is required`);
  }
  return value;
}

const stripSlash = (url: string) => url.replace(/\/+$/, '');

export function loadConfig(env: Env = process.env): MiroConfig {
  return {
    clientId: requireVar(env, 'MIRO_CLIENT_ID'),
    clientSecret: requireVar(env, 'MIRO_CLIENT_SECRET'),
    redirectUrl: read(env, 'MIRO_REDIRECT_URL') ?? DEFAULT_REDIRECT_URL,
    apiBaseUrl: stripSlash(read(env, 'MIRO_API_BASE_URL') ?? DEFAULT_API_BASE_URL),
    authBaseUrl: stripSlash(read(env, 'MIRO_AUTH_BASE_URL') ?? DEFAULT_AUTH_BASE_URL),
  };
}
