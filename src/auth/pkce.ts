/**
 * PKCE (S256) for the upstream authorization code flow.
 *
 * `/oauth/authorize` keeps the verifier with the pending state and sends the challenge upstream;
 * `/oauth/callback` replays the verifier during the code exchange.
 */
import { randomToken, sha256Base64url } from './crypto';

export type PkcePair = {
  codeVerifier: string;
  codeChallenge: string;
};

export const createPkcePair = (): PkcePair => {
  const codeVerifier = randomToken(32);
  return { codeVerifier, codeChallenge: sha256Base64url(codeVerifier) };
};
