export const DEFAULT_REDIRECT_URI = 'http://localhost:8888/callback/';

export interface AppConfig {
  clientId: string;
  clientSecret: string;
  /** Spotify user id that owns the generated playlists */
  username?: string;
  redirectUri: string;
  refreshToken?: string;
}

type Env = Record<string, string | undefined>;

const read = (env: Env, key: string): string | undefined => {
  const value = env[key]?.trim();
  return value ? value : undefined;
};

/**
 * Builds the configuration from environment variables (typically loaded from .env).
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const clientId = read(env, 'SPOTIFY_CLIENT_ID');
  const clientSecret = read(env, 'SPOTIFY_SECRET');

  if (!clientId || !clientSecret) {
    const missing = [
      clientId ? null : 'SPOTIFY_CLIENT_ID',
      clientSecret ? null : 'SPOTIFY_SECRET'
    ].filter((key): key is string => key !== null);
    throw new Error(`Spotify API credentials missing: set ${missing.join(' and ')} in .env file`);
  }

  return {
    clientId,
    clientSecret,
    username: read(env, 'SPOTIFY_USERNAME'),
    redirectUri: read(env, 'SPOTIFY_REDIRECT_URI') ?? DEFAULT_REDIRECT_URI,
    refreshToken: read(env, 'SPOTIFY_REFRESH_TOKEN')
  };
}
