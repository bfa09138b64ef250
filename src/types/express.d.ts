import type { AuthContext } from '../auth/request_context';

declare global {
  namespace Express {
    interface Request {
      mcpAuth?: AuthContext;
    }
  }
}

export {};
