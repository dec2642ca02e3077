import { Response, Router } from 'express';
import { logger } from '../config/logger';

export const healthHandler =
  (checkDatabase: () => Promise<boolean>) =>
  async (_req: unknown, res: Pick<Response, 'status' | 'json'>): Promise<void> => {
    try {
      const database = await checkDatabase();
      res.status(database ? 200 : 503).json({
        success: database,
        data: {
          status: database ? 'healthy' : 'degraded',
          database,
          timestamp: new Date().toISOString(),
          uptime: process.uptime(),
        },
      });
    } catch (error) {
      logger.error('Health check failed:', error);
      res.status(500).json({
        success: false,
        error: 'Health check failed',
      });
    }
  };

export function createHealthRoutes(checkDatabase: () => Promise<boolean>): Router {
  const router = Router();
  router.get('/', healthHandler(checkDatabase));
  return router;
}
