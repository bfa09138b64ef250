import type { Response } from 'express';

export const setNoCORS = (res: Response) => {
  // Intentional: don't reflect Origin on OAuth endpoints.
  res.removeHeader('Access-Control-Allow-Origin');
};

export const setNoStore = (res: Response) => {
  // RFC 6749 requires these headers on responses containing tokens/credentials.
  res.setHeader('Cache-Control', 'no-store');
  res.setHeader('Pragma', 'no-cache');
};

export const setPublicCors = (res: Response) => {
  res.setHeader('Access-Control-Allow-Origin', '*');
  res.setHeader('Access-Control-Allow-Methods', 'GET, OPTIONS');
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
};

/** Single-valued query parameter; repeated or nested values count as absent. */
export const queryString = (value: unknown): string | undefined => (typeof value === 'string' ? value : undefined);
