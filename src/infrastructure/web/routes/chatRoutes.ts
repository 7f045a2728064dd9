import { Router, type Request, type Response } from 'express';
import type { ChatService } from '../../../application/services/ChatService.js';
import type { Config } from '../../../config.js';
import { asyncHandler } from '../middleware/errorHandler.js';
import { jsonBody, queryLimit } from './params.js';

/**
 * Chat, configuration generation and configuration review
 */
export function createChatRoutes(chatService: ChatService, chatConfig: Config['chat']): Router {
  const router = Router();

  router.post(
    '/send',
    asyncHandler(async (req: Request, res: Response) => {
      const body = jsonBody(req);
      const data = await chatService.sendMessage({ message: body.message, session_id: body.session_id });
      res.json({ success: true, data });
    })
  );

  router.get('/history/:sessionId', (req: Request, res: Response) => {
    const limit = queryLimit(req, chatConfig.maxHistory);
    res.json({ success: true, data: chatService.getHistory(req.params.sessionId, limit) });
  });

  router.get('/sessions', (_req: Request, res: Response) => {
    res.json({ success: true, data: chatService.listSessions() });
  });

  router.delete('/sessions/:sessionId', (req: Request, res: Response) => {
    res.json({ success: true, data: chatService.deleteSession(req.params.sessionId) });
  });

  router.post(
    '/generate-config',
    asyncHandler(async (req: Request, res: Response) => {
      const body = jsonBody(req);
      const data = await chatService.generateConfiguration(body.config_type, body.parameters);
      res.json({ success: true, data });
    })
  );

  router.post(
    '/validate-config',
    asyncHandler(async (req: Request, res: Response) => {
      const body = jsonBody(req);
      const data = await chatService.validateConfiguration(body.config_content, body.device_type);
      res.json({ success: true, data });
    })
  );

  return router;
}
