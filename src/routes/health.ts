import { Router, Request, Response } from 'express';
import { performance } from 'node:perf_hooks';

import type { AuthStateStoreKind } from '../config';
import { errorMessage } from '../lib/errors';
import { logger } from '../lib/logger';
import type { Clock } from '../lib/time';
import { systemClock, toIso } from '../lib/time';

type CheckResult = { status: 'healthy' | 'unhealthy' } & Record<string, unknown>;

export type HealthDeps = {
  ping: () => Promise<void>;
  version: string;
  environment: string;
  encryptionKey: string;
  oidcIssuer: string;
  oidcClientId: string;
  oidcClientSecret: string;
  authStateStore: AuthStateStoreKind;
  clock?: Clock;
};

const maskClientId = (clientId: string) => `${clientId.slice(0, 10)}...`;

export const createHealthRouter = (deps: HealthDeps) => {
  const router = Router();
  const clock = deps.clock ?? systemClock;

  const checkDatabase = async (): Promise<CheckResult> => {
    const started = performance.now();
    try {
      await deps.ping();
      return { status: 'healthy', latency_ms: Math.round((performance.now() - started) * 100) / 100 };
    } catch (err) {
      logger.error('Health', 'Database check failed', { error: errorMessage(err) });
      return { status: 'unhealthy', error: 'Database unavailable' };
    }
  };

  const checkConfiguration = (): CheckResult => {
    const missing = deps.encryptionKey ? [] : ['ENCRYPTION_KEY'];
    if (missing.length > 0) {
      return { status: 'unhealthy', error: `Missing required settings: ${missing.join(', ')}` };
    }
    return { status: 'healthy', auth_state_store: deps.authStateStore };
  };

  const checkOAuth = (): CheckResult => {
    if (!deps.oidcClientId) return { status: 'unhealthy', error: 'Missing OIDC_CLIENT_ID' };
    if (!deps.oidcClientSecret) return { status: 'unhealthy', error: 'Missing OIDC_CLIENT_SECRET' };
    return { status: 'healthy', issuer: deps.oidcIssuer, client_id: maskClientId(deps.oidcClientId) };
  };

  /**
   * GET /health
   * Answers without touching dependencies, for load balancers.
   */
  router.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'healthy' });
  });

  router.get('/health/liveness', (_req: Request, res: Response) => {
    res.json({ status: 'alive' });
  });

  /**
   * GET /health/readiness
   * 503 while the database cannot answer a trivial query.
   */
  router.get('/health/readiness', async (_req: Request, res: Response) => {
    const database = await checkDatabase();
    if (database.status !== 'healthy') {
      res.status(503).json({ status: 'not_ready', reason: 'database' });
      return;
    }
    res.json({ status: 'ready' });
  });

  router.get('/health/detailed', async (_req: Request, res: Response) => {
    const checks = {
      database: await checkDatabase(),
      configuration: checkConfiguration(),
      oauth: checkOAuth(),
    };
    const degraded = Object.values(checks).some((check) => check.status !== 'healthy');
    res.json({
      status: degraded ? 'degraded' : 'healthy',
      timestamp: toIso(clock()),
      version: deps.version,
      environment: deps.environment,
      checks,
    });
  });

  return router;
};
