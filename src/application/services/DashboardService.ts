import type { IConversationRepository } from '../../core/interfaces/IConversationRepository.js';
import type { ProviderChainEntry } from '../../core/entities/LLM.js';
import type { RoutingStatsSnapshot } from '../../infrastructure/llm/FallbackLLMManager.js';
import type { DeviceService, DeviceStatistics, OperationResponse } from './DeviceService.js';
import type { ProviderChainBuilder } from './ProviderChainBuilder.js';

export interface DashboardStats {
  devices: DeviceStatistics;
  conversations: { total_messages: number; total_sessions: number };
  providers: ProviderChainEntry[];
  routing: RoutingStatsSnapshot;
  recent_operations: Array<OperationResponse & { device_id: string }>;
}

const RECENT_OPERATIONS = 5;

export class DashboardService {
  constructor(
    private deviceService: DeviceService,
    private conversationRepo: IConversationRepository,
    private chainBuilder: ProviderChainBuilder
  ) {}

  getStats(): DashboardStats {
    return {
      devices: this.deviceService.getStatistics(),
      conversations: {
        total_messages: this.conversationRepo.countMessages(),
        total_sessions: this.conversationRepo.countSessions(),
      },
      providers: this.chainBuilder.describeChain('chat'),
      routing: this.chainBuilder.getStats(),
      recent_operations: this.deviceService.getRecentOperations(RECENT_OPERATIONS),
    };
  }
}
