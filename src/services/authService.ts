import axios, { AxiosInstance, CreateAxiosDefaults } from 'axios';
import * as crypto from 'crypto';
import { AppConfig } from '../config';
import { waitForAuthorizationCode } from '../server';
import { describeError } from '../utils/errors';

export const SCOPES = ['user-top-read', 'playlist-modify-public', 'playlist-modify-private'] as const;

export interface SpotifyTokenResponse {
  access_token: string;
  token_type: string;
  expires_in: number;
  scope?: string;
  refresh_token?: string;
}

export type AuthorizationCodeReceiver = (redirectUri: string, state: string) => Promise<string>;

/**
 * Validates that data is a token response with a usable access token.
 */
function isTokenResponse(data: unknown): data is SpotifyTokenResponse {
  if (!data || typeof data !== 'object' || !('access_token' in data)) return false;
  return typeof data.access_token === 'string' && data.access_token.trim() !== '';
}

class AuthService {
  private tokenUrl: string = 'https://accounts.spotify.com/api/token';
  private authorizeUrl: string = 'https://accounts.spotify.com/authorize';
  private http: AxiosInstance;

  /**
   * @param config Client credentials, redirect URI and optional refresh token
   * @param httpConfig Extra axios settings for token requests
   * @param receiveCode Waits for the browser to hit the redirect URI and yields the code
   */
  constructor(
    private readonly config: AppConfig,
    httpConfig: CreateAxiosDefaults = {},
    private readonly receiveCode: AuthorizationCodeReceiver = waitForAuthorizationCode
  ) {
    this.http = axios.create(httpConfig);
  }

  /**
   * Generate a random string, used as the OAuth state parameter
   * @param length Length of the random string
   */
  generateRandomString(length: number): string {
    const possible = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';
    const values = crypto.randomBytes(length);

    return Array.from(values)
      .map(x => possible[x % possible.length])
      .join('');
  }

  /**
   * Get the authorization URL for the Spotify OAuth flow
   * @param state Value echoed back to the redirect URI
   */
  getAuthorizationUrl(state: string): string {
    const params = new URLSearchParams({
      client_id: this.config.clientId,
      response_type: 'code',
      redirect_uri: this.config.redirectUri,
      scope: SCOPES.join(' '),
      state
    });

    return `${this.authorizeUrl}?${params.toString()}`;
  }

  private async requestToken(params: URLSearchParams): Promise<SpotifyTokenResponse> {
    const basicAuth = Buffer.from(`${this.config.clientId}:${this.config.clientSecret}`).toString('base64');

    const response = await this.http.post<unknown>(this.tokenUrl, params, {
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        'Authorization': `Basic ${basicAuth}`
      }
    });

    if (!isTokenResponse(response.data)) {
      throw new Error('Token response did not include an access token');
    }
    return response.data;
  }

  /**
   * Exchange an authorization code for an access token
   */
  async getAccessTokenFromCode(code: string): Promise<SpotifyTokenResponse> {
    return this.requestToken(new URLSearchParams({
      grant_type: 'authorization_code',
      code,
      redirect_uri: this.config.redirectUri
    }));
  }

  /**
   * Refresh an access token using a refresh token
   */
  async refreshAccessToken(refreshToken: string): Promise<SpotifyTokenResponse> {
    return this.requestToken(new URLSearchParams({
      grant_type: 'refresh_token',
      refresh_token: refreshToken
    }));
  }

  /**
   * Ask the user to approve access in a browser, then exchange the returned code
   */
  async authorizeInteractively(): Promise<SpotifyTokenResponse> {
    const state = this.generateRandomString(16);

    console.log('Open this URL in your browser to authorize access to your Spotify account:');
    console.log(this.getAuthorizationUrl(state));

    const code = await this.receiveCode(this.config.redirectUri, state);
    return this.getAccessTokenFromCode(code);
  }

  /**
   * Get an access token, from the configured refresh token when there is one
   * @returns The access token, or null when none could be obtained
   */
  async getSpotifyToken(): Promise<string | null> {
    try {
      if (this.config.refreshToken) {
        console.log('Refreshing access token...');
        const token = await this.refreshAccessToken(this.config.refreshToken);
        return token.access_token;
      }

      const token = await this.authorizeInteractively();
      return token.access_token;
    } catch (error) {
      console.error('Failed to retrieve Spotify token!', describeError(error));
      return null;
    }
  }
}

export default AuthService;
