import type { Config } from './config.js';
import { DatabaseConnection } from './infrastructure/database/DatabaseConnection.js';
import { ConversationRepository } from './infrastructure/database/repositories/ConversationRepository.js';
import { DeviceRepository } from './infrastructure/database/repositories/DeviceRepository.js';
import { OperationLogRepository } from './infrastructure/database/repositories/OperationLogRepository.js';
import { SettingsRepository } from './infrastructure/database/repositories/SettingsRepository.js';
import { tcpProbe, type ConnectivityProbe } from './infrastructure/network/TcpProbe.js';
import { WebServer } from './infrastructure/web/WebServer.js';
import { ChatService } from './application/services/ChatService.js';
import { DashboardService } from './application/services/DashboardService.js';
import { DeviceService } from './application/services/DeviceService.js';
import { GenAISettingsService, sectionSeedsFromConfig } from './application/services/GenAISettingsService.js';
import { ProviderChainBuilder } from './application/services/ProviderChainBuilder.js';
import { SecretBox } from './utils/secrets.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('Application');

export interface ApplicationOptions {
  /** Replaces the TCP connectivity check, mainly for tests */
  probe?: ConnectivityProbe;
}

/**
 * Owns the database connection, services and web server for one process
 */
export class Application {
  readonly database: DatabaseConnection;
  readonly settings: GenAISettingsService;
  readonly chains: ProviderChainBuilder;
  readonly devices: DeviceService;
  readonly chat: ChatService;
  readonly dashboard: DashboardService;
  readonly webServer: WebServer;

  constructor(private config: Config, options: ApplicationOptions = {}) {
    this.database = new DatabaseConnection(config.database.path);
    const db = this.database.getDatabase();

    const conversationRepo = new ConversationRepository(db);
    const settingsRepo = new SettingsRepository(db);
    const deviceRepo = new DeviceRepository(db);
    const operationRepo = new OperationLogRepository(db);

    const secrets = new SecretBox(config.security.secretKey);

    this.settings = new GenAISettingsService(
      settingsRepo,
      secrets,
      config.providers,
      sectionSeedsFromConfig(config)
    );
    this.chains = new ProviderChainBuilder(config, this.settings);
    this.devices = new DeviceService(
      deviceRepo,
      operationRepo,
      secrets,
      this.settings,
      config.devices,
      options.probe ?? tcpProbe
    );
    this.chat = new ChatService(conversationRepo, this.chains, this.devices, config.chat);
    this.dashboard = new DashboardService(this.devices, conversationRepo, this.chains);

    this.webServer = new WebServer(config, this.database, {
      chat: this.chat,
      settings: this.settings,
      devices: this.devices,
      dashboard: this.dashboard,
      chains: this.chains,
    });
  }

  async start(port?: number, host?: string): Promise<void> {
    await this.webServer.start(port, host);
    const stats = this.database.getStatistics();
    logger.info('Application started', {
      devices: stats.totalDevices,
      sessions: stats.totalSessions,
      providers: this.chains.describeChain('chat').filter((p) => p.configured).map((p) => p.name),
    });
  }

  async stop(): Promise<void> {
    try {
      await this.webServer.stop();
    } finally {
      if (this.database.isOpen()) {
        this.database.close();
      }
      logger.info(`Application stopped (${this.config.server.name})`);
    }
  }
}

export function createApplication(config: Config, options: ApplicationOptions = {}): Application {
  return new Application(config, options);
}
