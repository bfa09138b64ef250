/**
 * OAuth metadata endpoints ("well-known").
 *
 * Serves protected resource metadata so MCP clients can discover that `/mcp` takes a bearer
 * session id and where to start the authorization flow.
 */
import type { Request, Response, Router } from 'express';

import { setPublicCors } from './http_utils';

export const PROTECTED_RESOURCE_PATH = '/.well-known/oauth-protected-resource';

export const resourceMetadataUrl = (publicUrl: string) => `${publicUrl}${PROTECTED_RESOURCE_PATH}/mcp`;

export const registerWellKnownRoutes = (router: Router, publicUrl: string) => {
  const metadata = (resource: string) => ({
    resource,
    authorization_servers: [publicUrl],
    authorization_endpoint: `${publicUrl}/oauth/authorize`,
    registration_endpoint: `${publicUrl}/clients/register`,
    bearer_methods_supported: ['header'],
  });

  const resources: Array<[path: string, resource: string]> = [
    [PROTECTED_RESOURCE_PATH, publicUrl],
    [`${PROTECTED_RESOURCE_PATH}/mcp`, `${publicUrl}/mcp`],
  ];

  for (const [path, resource] of resources) {
    router.options(path, (_req, res) => {
      setPublicCors(res);
      res.status(204).end();
    });

    router.get(path, (_req: Request, res: Response) => {
      setPublicCors(res);
      res.json(metadata(resource));
    });
  }
};
