import { Router, type Request, type Response } from 'express';
import type { GenAISettingsService } from '../../../application/services/GenAISettingsService.js';
import type { ProviderChainBuilder } from '../../../application/services/ProviderChainBuilder.js';
import { SETTINGS_SECTION_NAMES } from '../../../core/entities/Settings.js';
import { ValidationError } from '../../../core/errors.js';
import { asyncHandler } from '../middleware/errorHandler.js';
import { jsonBody } from './params.js';

export function createSettingsRoutes(
  settingsService: GenAISettingsService,
  chainBuilder: ProviderChainBuilder
): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({ success: true, data: settingsService.getAll() });
  });

  router.put('/', (req: Request, res: Response) => {
    const body: unknown = req.body;
    res.json({ success: true, data: settingsService.updateAll(body) });
  });

  // graph_rag is served as /graph-rag
  for (const section of SETTINGS_SECTION_NAMES) {
    const path = `/${section.replace(/_/g, '-')}`;

    router.get(path, (_req: Request, res: Response) => {
      res.json({ success: true, data: settingsService.getSection(section) });
    });

    router.put(path, (req: Request, res: Response) => {
      const body: unknown = req.body;
      res.json({ success: true, data: settingsService.updateSection(section, body) });
    });
  }

  router.get('/api-keys', (_req: Request, res: Response) => {
    res.json({ success: true, data: settingsService.listApiKeys() });
  });

  router.post('/api-keys', (req: Request, res: Response) => {
    const body: unknown = req.body;
    res.status(201).json({ success: true, data: settingsService.addApiKey(body) });
  });

  router.delete('/api-keys/:id', (req: Request, res: Response) => {
    const id = Number(req.params.id);
    if (!Number.isInteger(id)) {
      throw new ValidationError('API key id must be an integer');
    }
    res.json({ success: true, data: settingsService.deleteApiKey(id) });
  });

  router.post(
    '/test-connection',
    asyncHandler(async (req: Request, res: Response) => {
      const body = jsonBody(req);
      if (typeof body.provider !== 'string' || typeof body.api_key !== 'string' || !body.api_key) {
        throw new ValidationError('provider and api_key are required');
      }
      res.json({ success: true, data: await settingsService.testConnection(body.provider, body.api_key) });
    })
  );

  router.get('/providers', (_req: Request, res: Response) => {
    res.json({
      success: true,
      data: {
        chains: {
          chat: chainBuilder.describeChain('chat'),
          config_generation: chainBuilder.describeChain('config_generation'),
          analysis: chainBuilder.describeChain('analysis'),
        },
        stats: chainBuilder.getStats(),
      },
    });
  });

  return router;
}
