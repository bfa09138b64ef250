/**
 * Per-request auth context.
 *
 * After bearer validation the authenticated session is stored in AsyncLocalStorage so the MCP
 * SDK request handlers can read the caller without threading it through the transport.
 */
import { AsyncLocalStorage } from 'node:async_hooks';

export type AuthContext = {
  userId: string;
  sessionId: string;
};

const als = new AsyncLocalStorage<AuthContext>();

export const runWithAuthContext = <T>(auth: AuthContext, fn: () => T) => {
  return als.run(auth, fn);
};

export const getAuthContext = () => {
  return als.getStore();
};
