import express from 'express';
import { createCallbackRouter } from './routes/callback';
import { AuthenticationError } from './utils/errors';

/**
 * Serves the redirect URI locally until Spotify calls back with an authorization code.
 * The server is closed as soon as the first callback arrives.
 */
export function waitForAuthorizationCode(redirectUri: string, state: string): Promise<string> {
  const url = new URL(redirectUri);
  const port = Number(url.port || (url.protocol === 'https:' ? 443 : 80));

  return new Promise((resolve, reject) => {
    const app = express();

    app.use(createCallbackRouter(url.pathname, state, result => {
      server.close();
      if ('code' in result) resolve(result.code);
      else reject(new AuthenticationError(result.error));
    }));

    const server = app.listen(port, url.hostname, () => {
      console.log(`Waiting for the authorization callback on ${url.origin}${url.pathname}...`);
    });

    server.on('error', error => {
      reject(new AuthenticationError(`Could not listen on port ${port} for the authorization callback`, { cause: error }));
    });
  });
}
