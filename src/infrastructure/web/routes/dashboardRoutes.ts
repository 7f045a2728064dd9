import { Router, type Request, type Response } from 'express';
import type { DashboardService } from '../../../application/services/DashboardService.js';

export function createDashboardRoutes(dashboardService: DashboardService): Router {
  const router = Router();

  router.get('/stats', (_req: Request, res: Response) => {
    res.json({ success: true, data: dashboardService.getStats() });
  });

  return router;
}
