/**
 * OAuth client credentials plus the access token of the current session.
 *
 * The token lives in memory only; it is set by a successful code exchange
 * and lost when the process exits.
 */

import { type MiroConfig } from './config';
import { notAuthenticatedError } from './errors';

export class CredentialStore {
  readonly clientId: string;
  readonly clientSecret: string;
  readonly redirectUrl: string;
  private readonly authBaseUrl: string;
  private accessToken: string | null = null;

  constructor(
    config: Pick<MiroConfig, 'clientId' | 'clientSecret' | 'redirectUrl' | 'authBaseUrl'>
  ) {
    this.clientId = config.clientId;
    this.clientSecret = config.clientSecret;
    this.redirectUrl = config.redirectUrl;
    this.authBaseUrl = config.authBaseUrl;
  }

  /** Replace the current access token. */
  setToken(token: string): void {
    this.accessToken = token;
  }

  isAuthenticated(): boolean {
    return this.accessToken !== null;
  }

  /** `Authorization` header value; throws NotAuthenticated without a token. */
  getAuthHeader(): string {
    if (this.accessToken === null) {
      throw notAuthenticatedError();
    }
    return `Bearer ${this.accessToken}`;
  }

  /** URL the user opens to grant access.  No side effects. */
  buildAuthorizationUrl(): string {
    const url = new URL('/oauth/authorize', this.authBaseUrl);
    url.searchParams.set('response_type', 'code');
    url.searchParams.set('client_id', this.clientId);
    url.searchParams.set('redirect_uri', this.redirectUrl);
    return url.toString();
  }
}
