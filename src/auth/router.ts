/**
 * OAuth router composition.
 *
 * Mounts the well-known metadata, the authorization flow endpoints and dynamic client
 * registration onto a single Express router.
 */
import express from 'express';

import type { ClientRegistrar } from './clients';
import type { AuthorizationFlow } from './flow';
import { bearerAuth } from './middleware';
import { registerOAuthRoutes } from './routes/oauth';
import { registerClientRoutes } from './routes/register';
import { registerWellKnownRoutes, resourceMetadataUrl } from './routes/well_known';
import type { SessionManager } from './sessions';

export type OAuthRouterDeps = {
  publicUrl: string;
  flow: AuthorizationFlow;
  sessions: SessionManager;
  clients: ClientRegistrar;
  clientExpiryDays: number;
};

export const createOAuthRouter = (deps: OAuthRouterDeps) => {
  const router = express.Router();

  registerWellKnownRoutes(router, deps.publicUrl);
  const requireSession = bearerAuth(deps.sessions, resourceMetadataUrl(deps.publicUrl));
  registerOAuthRoutes(router, deps.flow, requireSession);
  registerClientRoutes(router, deps.clients, deps.clientExpiryDays, requireSession);

  return router;
};
