import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { CallToolRequestSchema, ErrorCode, ListToolsRequestSchema, McpError } from '@modelcontextprotocol/sdk/types.js';
import express from 'express';
import type http from 'http';

import { bearerAuth, AUTH_MESSAGES } from '../auth/middleware';
import { getAuthContext } from '../auth/request_context';
import { createOAuthRouter } from '../auth/router';
import { resourceMetadataUrl } from '../auth/routes/well_known';
import type { AppContext } from '../context';
import { errorMessage } from '../lib/errors';
import { logger } from '../lib/logger';
import { createErrorHandler } from '../middleware/error_handler';
import { createHealthRouter } from '../routes/health';

import { isToolName } from './registry';

/**
 * Builds the low-level SDK server for one `/mcp` request.
 *
 * The caller has already passed `bearerAuth`, so the authenticated session is read from the
 * request's async context rather than from the transport.
 */
export const createSdkServer = (ctx: AppContext) => {
  const server = new Server(
    { name: ctx.config.appName, version: ctx.config.version },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: ctx.dispatcher.listTools(),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const auth = getAuthContext();
    if (!auth) {
      throw new McpError(ErrorCode.InvalidRequest, AUTH_MESSAGES.missing);
    }
    const { name, arguments: args } = request.params;
    if (!isToolName(name)) {
      throw new McpError(ErrorCode.InvalidParams, `Tool '${name}' not found`);
    }
    return ctx.dispatcher.execute(name, args ?? {}, auth);
  });

  return server;
};

/**
 * The Express application: health probes, OAuth and client registration, the JSON tool
 * endpoints and the Streamable HTTP MCP endpoint.
 */
export const createHttpApp = (ctx: AppContext) => {
  const { config } = ctx;
  const metadataUrl = resourceMetadataUrl(config.publicUrl);
  const requireSession = bearerAuth(ctx.sessions, metadataUrl);

  const app = express();
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));
  app.set('trust proxy', true);

  app.use(
    createHealthRouter({
      ping: () => ctx.store.ping(),
      version: config.version,
      environment: config.environment,
      encryptionKey: config.encryptionKey,
      oidcIssuer: config.oidcIssuer,
      oidcClientId: config.oidcClientId,
      oidcClientSecret: config.oidcClientSecret,
      authStateStore: config.authStateStore,
    })
  );
  app.use(
    createOAuthRouter({
      publicUrl: config.publicUrl,
      flow: ctx.flow,
      sessions: ctx.sessions,
      clients: ctx.clients,
      clientExpiryDays: config.clientExpiryDays,
    })
  );

  app.post('/mcp/initialize', (_req, res) => {
    res.json({
      protocolVersion: config.protocolVersion,
      capabilities: { tools: {} },
      serverInfo: { name: config.appName, version: config.version },
    });
  });

  app.post('/mcp/tools/list', (_req, res) => {
    res.json({ tools: ctx.dispatcher.listTools() });
  });

  app.post('/mcp/tools/call', async (req, res) => {
    const body: unknown = req.body;
    const call: object = typeof body === 'object' && body !== null ? body : {};
    const result = await ctx.dispatcher.dispatch(
      {
        name: 'name' in call ? call.name : undefined,
        params: 'params' in call ? call.params : undefined,
      },
      req.get('authorization')
    );
    res.json(result);
  });

  app.post('/mcp', requireSession, async (req, res) => {
    // Stateless Streamable HTTP: no Mcp-Session-Id; create transport/server per request.
    const server = createSdkServer(ctx);
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
    res.on('close', () => {
      server.close().catch((err) => logger.warn('McpServer', 'Failed to close SDK server', { error: errorMessage(err) }));
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      logger.error('McpServer', 'MCP request failed', { error: errorMessage(err) });
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: '2.0',
          error: { code: ErrorCode.InternalError, message: 'Internal server error' },
          id: null,
        });
      }
    }
  });

  // This server does not provide a standalone GET SSE stream in stateless mode.
  // Clients should use POST responses (JSON or SSE) only.
  const methodNotAllowed = (_req: express.Request, res: express.Response) => {
    res.sendStatus(405);
  };
  app.get('/mcp', requireSession, methodNotAllowed);
  app.delete('/mcp', requireSession, methodNotAllowed);

  app.use(createErrorHandler(metadataUrl));
  return app;
};

/**
 * Owns the listening HTTP server and the application context behind it.
 */
export class McpServer {
  private httpServer: http.Server | null = null;

  constructor(private readonly ctx: AppContext) {}

  /**
   * Starts listening and resolves once the port is bound.
   *
   * @param port The port to listen on; 0 picks an ephemeral one.
   */
  public async startHttp(port: number): Promise<http.Server> {
    const app = createHttpApp(this.ctx);
    const server = await new Promise<http.Server>((resolve, reject) => {
      const listening = app.listen(port, (err?: Error) => (err ? reject(err) : resolve(listening)));
    });
    this.httpServer = server;
    logger.info('McpServer', `MCP HTTP server listening on port ${port}`, {
      publicUrl: this.ctx.config.publicUrl,
      environment: this.ctx.config.environment,
    });
    return server;
  }

  public async stop(): Promise<void> {
    const server = this.httpServer;
    this.httpServer = null;
    if (server) {
      await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    }
    await this.ctx.close();
    logger.info('McpServer', 'Stopped');
  }
}
