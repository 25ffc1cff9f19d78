// src/lib/googleAuth.ts
import { OAuth2Client } from 'google-auth-library';
import type { AppConfig } from '../config/env.js';

export const CALENDAR_SCOPES = ['https://www.googleapis.com/auth/calendar'];

/**
 * Create OAuth2Client with the app's Google credentials
 */
export function createOAuth2Client(google: AppConfig['google']): OAuth2Client {
  return new OAuth2Client(google.clientId, google.clientSecret, google.redirectUri);
}

/**
 * The two halves of the authorization-code flow
 */
export interface OAuthFlow {
  authorizeUrl(state: string): string;
  /** Exchange the callback code for a client holding the user's tokens */
  exchangeCode(code: string): Promise<OAuth2Client>;
}

export class GoogleOAuthFlow implements OAuthFlow {
  constructor(private readonly google: AppConfig['google']) {}

  authorizeUrl(state: string): string {
    // offline + consent so Google always returns a refresh token
    return createOAuth2Client(this.google).generateAuthUrl({
      access_type: 'offline',
      prompt: 'consent',
      scope: CALENDAR_SCOPES,
      state,
    });
  }

  async exchangeCode(code: string): Promise<OAuth2Client> {
    const client = createOAuth2Client(this.google);
    const { tokens } = await client.getToken(code);
    client.setCredentials(tokens);
    return client;
  }
}

/**
 * Client for scripts that already hold a refresh token
 */
export function createRefreshTokenClient(
  google: AppConfig['google'],
  refreshToken: string
): OAuth2Client {
  const client = createOAuth2Client(google);
  client.setCredentials({ refresh_token: refreshToken });
  return client;
}
