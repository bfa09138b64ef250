/**
 * Tool dispatch: lookup, authentication, validation, execution.
 *
 * Both transports end here. The JSON endpoint calls `dispatch` with the raw Authorization header;
 * the SDK endpoint authenticates in middleware first and calls `execute` with the resulting
 * context.
 */
import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';

import { AUTH_MESSAGES, authenticateBearer } from '../auth/middleware';
import type { AuthContext } from '../auth/request_context';
import type { SessionManager } from '../auth/sessions';
import { AuthenticationError, DomainError, errorMessage, InvalidRequestError, UnknownToolError } from '../lib/errors';
import { logger } from '../lib/logger';
import type { ProviderCredentials } from '../services/calendar';
import type { TaskService } from '../services/task_service';

import type { RegisteredTool, ToolName } from './registry';
import { isToolName, toolDescriptors, TOOLS } from './registry';
import type { ToolContext } from './tool_context';

export type ToolCallRequest = {
  name?: unknown;
  params?: unknown;
};

export type ToolEnvelope = CallToolResult & {
  content: Array<{ type: 'text'; text: string }>;
};

const envelope = (payload: unknown): ToolEnvelope => ({
  content: [{ type: 'text', text: JSON.stringify(payload) }],
});

export type ToolDispatcherDeps = {
  sessions: SessionManager;
  tasks: TaskService;
};

export class ToolDispatcher {
  constructor(private readonly deps: ToolDispatcherDeps) {}

  listTools(): Tool[] {
    return toolDescriptors();
  }

  /** Raises for a missing name (400) and for a name that is not registered (404). */
  resolve(name: unknown): { name: ToolName; tool: RegisteredTool } {
    if (typeof name !== 'string' || name === '') {
      throw new InvalidRequestError('Tool name is required');
    }
    if (!isToolName(name)) {
      throw new UnknownToolError(name);
    }
    return { name, tool: TOOLS[name] };
  }

  async dispatch(request: ToolCallRequest, authorization: string | undefined): Promise<ToolEnvelope> {
    const { name } = this.resolve(request.name);
    const auth = await authenticateBearer(this.deps.sessions, authorization);
    return this.execute(name, request.params, auth);
  }

  async execute(name: ToolName, params: unknown, auth: AuthContext): Promise<ToolEnvelope> {
    const prepared = TOOLS[name].prepare(params);
    if (!prepared.ok) {
      logger.debug('Dispatch', 'Rejected tool parameters', { tool: name, error: prepared.error });
      return envelope({ error: prepared.error, code: 'VALIDATION_ERROR' });
    }

    logger.info('Dispatch', 'Executing tool', { tool: name, userId: auth.userId });
    try {
      return envelope(await prepared.run(this.contextFor(auth)));
    } catch (err) {
      if (err instanceof DomainError) {
        return envelope({ error: err.message, code: err.code });
      }
      logger.error('Dispatch', 'Tool execution failed', { tool: name, error: errorMessage(err) });
      throw err;
    }
  }

  private contextFor(auth: AuthContext): ToolContext {
    const { sessions, tasks } = this.deps;
    return {
      tasks: tasks.forUser(auth.userId),
      providerCredentials: async (): Promise<ProviderCredentials> => {
        const accessToken = await sessions.getDecryptedAccessToken(auth.sessionId);
        const refreshToken = await sessions.getDecryptedRefreshToken(auth.sessionId);
        if (accessToken === null || refreshToken === null) {
          // Logged out while the call was running.
          throw new AuthenticationError(AUTH_MESSAGES.invalid, 'invalid_token');
        }
        return { accessToken, refreshToken };
      },
    };
  }
}
