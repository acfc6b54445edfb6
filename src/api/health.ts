/**
 * Health Check Endpoint Handler
 *
 * Liveness only: status, live session count, version and timestamp.
 */

import type { Request, Response } from 'express';
import type { ContactStore } from '../sessions/store.js';

export function createHealthHandler(store: ContactStore) {
  return (_req: Request, res: Response): void => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      activeSessions: store.count(),
      version: process.env.npm_package_version ?? 'dev',
    });
  };
}
