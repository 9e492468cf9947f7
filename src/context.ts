/**
 * Builds the per-session ToolContext: one CredentialStore and the
 * MiroClient bound to it.
 */

import { type MiroConfig } from './config';
import { CredentialStore } from './credentials';
import { MiroClient, type MiroClientOptions } from './miro-client';
import { type ToolContext } from './types';

export function createContext(config: MiroConfig, options: MiroClientOptions = {}): ToolContext {
  const credentials = new CredentialStore(config);
  return {
    credentials,
    miro: new MiroClient(config, credentials, options),
  };
}
