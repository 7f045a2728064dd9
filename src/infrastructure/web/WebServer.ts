import express, { type Express, type Request, type Response } from 'express';
import type { Server as HttpServer } from 'http';
import type { AddressInfo } from 'net';
import cors from 'cors';
import path from 'path';
import type { Config } from '../../config.js';
import type { ChatService } from '../../application/services/ChatService.js';
import type { DashboardService } from '../../application/services/DashboardService.js';
import type { DeviceService } from '../../application/services/DeviceService.js';
import type { GenAISettingsService } from '../../application/services/GenAISettingsService.js';
import type { ProviderChainBuilder } from '../../application/services/ProviderChainBuilder.js';
import type { DatabaseConnection } from '../database/DatabaseConnection.js';
import { ChatSocketManager } from './ChatSocketManager.js';
import { apiNotFound, errorHandler } from './middleware/errorHandler.js';
import { requestLogger } from './middleware/requestLogger.js';
import { createChatRoutes } from './routes/chatRoutes.js';
import { createDashboardRoutes } from './routes/dashboardRoutes.js';
import { createDeviceRoutes } from './routes/deviceRoutes.js';
import { createSettingsRoutes } from './routes/settingsRoutes.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('WebServer');

export interface WebServerServices {
  chat: ChatService;
  settings: GenAISettingsService;
  devices: DeviceService;
  dashboard: DashboardService;
  chains: ProviderChainBuilder;
}

const PAGES: Record<string, string> = {
  '/': 'index.html',
  '/chat': 'chat.html',
  '/settings': 'settings.html',
  '/devices': 'devices.html',
};

export class WebServer {
  private app: Express;
  private httpServer: HttpServer | null = null;
  private readonly sockets: ChatSocketManager;

  constructor(
    private config: Pick<Config, 'server' | 'chat'>,
    private database: DatabaseConnection,
    private services: WebServerServices
  ) {
    this.app = express();
    this.sockets = new ChatSocketManager(services.chat);
    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware(): void {
    this.app.use(cors());
    this.app.use(express.json({ limit: '1mb' }));
    this.app.use(requestLogger);
    this.app.use('/static', express.static(this.config.server.publicDir));
  }

  private setupRoutes(): void {
    const publicDir = this.config.server.publicDir;

    for (const [route, file] of Object.entries(PAGES)) {
      this.app.get(route, (_req: Request, res: Response) => {
        res.sendFile(path.join(publicDir, file));
      });
    }

    this.app.get('/health', (_req: Request, res: Response) => {
      res.json({
        status: 'healthy',
        version: this.config.server.version,
        database: this.database.isOpen() ? 'connected' : 'disconnected',
      });
    });

    this.app.use('/api/v1/chat', createChatRoutes(this.services.chat, this.config.chat));
    this.app.use('/api/v1/genai-settings', createSettingsRoutes(this.services.settings, this.services.chains));
    this.app.use('/api/v1/devices', createDeviceRoutes(this.services.devices));
    this.app.use('/api/v1/dashboard', createDashboardRoutes(this.services.dashboard));

    this.app.use('/api', apiNotFound);
    this.app.use(errorHandler);
  }

  public start(port: number = this.config.server.port, host: string = this.config.server.host): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(port, host, () => {
        this.sockets.attach(server);
        this.services.chat.setBroadcaster(this.sockets);
        logger.info(`API available at http://${host}:${this.getPort()}`);
        resolve();
      });

      server.on('error', (error) => {
        logger.error('Server error', { error: error.message });
        reject(error);
      });

      this.httpServer = server;
    });
  }

  /**
   * Bound port once listening; useful when started on port 0
   */
  public getPort(): number {
    const address = this.httpServer?.address();
    if (address && typeof address === 'object') {
      const info: AddressInfo = address;
      return info.port;
    }
    return this.config.server.port;
  }

  public async stop(): Promise<void> {
    this.services.chat.setBroadcaster(null);
    await this.sockets.close();

    const server = this.httpServer;
    this.httpServer = null;
    if (!server) return;

    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        logger.info('HTTP server closed');
        resolve();
      });
      server.closeAllConnections();
    });
  }
}
