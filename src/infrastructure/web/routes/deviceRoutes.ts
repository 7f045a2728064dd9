import { Router, type Request, type Response } from 'express';
import type { DeviceService } from '../../../application/services/DeviceService.js';
import { asyncHandler } from '../middleware/errorHandler.js';
import { jsonBody, queryLimit } from './params.js';

/**
 * Device inventory routes; fixed paths are registered before /:id
 */
export function createDeviceRoutes(deviceService: DeviceService): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({ success: true, data: deviceService.listDevices() });
  });

  router.post('/', (req: Request, res: Response) => {
    const body: unknown = req.body;
    res.status(201).json({ success: true, data: deviceService.createDevice(body) });
  });

  router.get('/statistics/overview', (_req: Request, res: Response) => {
    res.json({ success: true, data: deviceService.getStatistics() });
  });

  router.post(
    '/bulk-operations/:operation',
    asyncHandler(async (req: Request, res: Response) => {
      const body = jsonBody(req);
      const data = await deviceService.bulkOperation(req.params.operation, body.device_ids);
      res.json({ success: true, data });
    })
  );

  router.get('/:id', (req: Request, res: Response) => {
    res.json({ success: true, data: deviceService.getDevice(req.params.id) });
  });

  router.put('/:id', (req: Request, res: Response) => {
    const body: unknown = req.body;
    res.json({ success: true, data: deviceService.updateDevice(req.params.id, body) });
  });

  router.delete('/:id', (req: Request, res: Response) => {
    res.json({ success: true, data: deviceService.deleteDevice(req.params.id) });
  });

  router.post(
    '/:id/test-connectivity',
    asyncHandler(async (req: Request, res: Response) => {
      res.json({ success: true, data: await deviceService.testConnectivity(req.params.id) });
    })
  );

  router.get('/:id/config', (req: Request, res: Response) => {
    res.json({ success: true, data: deviceService.getConfig(req.params.id) });
  });

  router.put('/:id/config', (req: Request, res: Response) => {
    const body = jsonBody(req);
    res.json({ success: true, data: deviceService.saveConfig(req.params.id, body.config) });
  });

  router.get('/:id/operations', (req: Request, res: Response) => {
    const limit = queryLimit(req, 50);
    res.json({ success: true, data: deviceService.getOperations(req.params.id, limit) });
  });

  return router;
}
