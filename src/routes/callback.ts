import { Router, Request, Response } from 'express';

export type CallbackResult = { code: string } | { error: string };

/**
 * Reads the authorization callback query Spotify sends to the redirect URI.
 */
export function parseCallbackQuery(query: Record<string, unknown>, expectedState: string): CallbackResult {
  const { code, state, error } = query;

  if (typeof error === 'string' && error) {
    return { error: `Authorization was not granted: ${error}` };
  }
  if (state !== expectedState) {
    return { error: 'State mismatch in authorization callback' };
  }
  if (typeof code !== 'string' || !code) {
    return { error: 'Authorization code missing' };
  }
  return { code };
}

/**
 * Handles the redirect from Spotify and reports the outcome once.
 */
export function createCallbackRouter(
  path: string,
  expectedState: string,
  onResult: (result: CallbackResult) => void
): Router {
  const router = Router();

  router.get(path, (req: Request, res: Response) => {
    const result = parseCallbackQuery(req.query, expectedState);

    if ('error' in result) {
      res.status(400).send(`${result.error}. You can close this window.`);
    } else {
      res.send('Authorization complete. You can close this window and return to the terminal.');
    }
    onResult(result);
  });

  return router;
}
