import { z } from 'zod';
import { PROVIDER_NAMES } from './LLM.js';

/**
 * GenAI settings sections
 *
 * Each section is stored as one JSON document in system_config. The schemas
 * strip unknown keys and fill in defaults for anything missing.
 */
export const LlmSettingsSchema = z.object({
  primary_llm: z.string().min(1).default('gpt-4'),
  temperature: z.number().min(0).max(2).default(0.7),
  max_tokens: z.number().int().min(1).max(200000).default(2000),
  top_p: z.number().min(0).max(1).default(1.0),
  fallback_llm: z.string().min(1).default('gpt-3.5-turbo'),
  retry_attempts: z.number().int().min(1).max(10).default(3),
  timeout_settings: z.number().int().min(1).max(600).default(120),
  specialized_models: z.record(z.string()).default({
    network_config_llm: 'gpt-4',
    troubleshooting_llm: 'gpt-4',
    security_analysis_llm: 'gpt-4',
  }),
});

export const RagSettingsSchema = z.object({
  cisco_documentation_enabled: z.boolean().default(true),
  cisco_doc_version: z.string().default('Latest'),
  update_frequency: z.string().default('Weekly'),
  similarity_threshold: z.number().min(0).max(1).default(0.7),
  max_retrieved_chunks: z.number().int().min(1).default(5),
  chunk_size: z.number().int().min(1).default(1024),
  overlap_percentage: z.number().int().min(0).max(100).default(20),
});

export const AgenticSettingsSchema = z.object({
  planning_agent_enabled: z.boolean().default(true),
  reasoning_depth: z.string().default('Intermediate'),
  step_validation: z.boolean().default(true),
  execution_agent_enabled: z.boolean().default(true),
  auto_execution_enabled: z.boolean().default(false),
  safety_checks: z.string().default('Syntax + Logic'),
  rollback_capability: z.boolean().default(true),
  multi_agent_workflow: z.boolean().default(true),
  conflict_resolution: z.string().default('Human intervention'),
  feedback_loop: z.boolean().default(true),
});

export const GraphRagSettingsSchema = z.object({
  knowledge_graph_enabled: z.boolean().default(false),
  entity_extraction_enabled: z.boolean().default(true),
  configuration_relationships: z.boolean().default(true),
  topology_connections: z.boolean().default(true),
  graph_provider: z.string().default('Neo4j'),
  connection_string: z.string().default(''),
  indexing_strategy: z.string().default('Batch'),
  dynamic_graph_updates: z.boolean().default(false),
  agent_graph_reasoning: z.boolean().default(false),
});

export const EmbeddingsSettingsSchema = z.object({
  text_embeddings_model: z.string().default('text-embedding-ada-002'),
  dimensions: z.number().int().min(1).default(1536),
  batch_size: z.number().int().min(1).default(64),
  config_embeddings_enabled: z.boolean().default(true),
  network_topology_embeddings: z.boolean().default(false),
  vector_database_provider: z.string().default('Chroma'),
  index_type: z.string().default('HNSW'),
  distance_metric: z.string().default('Cosine'),
});

export const CoreSettingsSchema = z.object({
  default_chat_provider: z.enum(PROVIDER_NAMES).default('openai'),
  default_config_generation_provider: z.enum(PROVIDER_NAMES).default('openai'),
  default_analysis_provider: z.enum(PROVIDER_NAMES).default('openai'),
  response_timeout: z.number().int().min(1).default(120),
  concurrent_requests: z.number().int().min(1).default(5),
  cache_enabled: z.boolean().default(true),
  cache_duration: z.number().int().min(0).default(3600),
  cache_size_limit: z.number().int().min(0).default(1024),
  max_devices_per_operation: z.number().int().min(1).default(10),
  require_approval_threshold: z.string().default('10+ devices'),
  safety_validation_level: z.string().default('Standard'),
  log_all_operations: z.boolean().default(true),
});

export type LlmSettings = z.infer<typeof LlmSettingsSchema>;
export type RagSettings = z.infer<typeof RagSettingsSchema>;
export type AgenticSettings = z.infer<typeof AgenticSettingsSchema>;
export type GraphRagSettings = z.infer<typeof GraphRagSettingsSchema>;
export type EmbeddingsSettings = z.infer<typeof EmbeddingsSettingsSchema>;
export type CoreSettings = z.infer<typeof CoreSettingsSchema>;

export interface SettingsSectionValues {
  llm: LlmSettings;
  rag: RagSettings;
  agentic: AgenticSettings;
  graph_rag: GraphRagSettings;
  embeddings: EmbeddingsSettings;
  core: CoreSettings;
}

export type SettingsSection = keyof SettingsSectionValues;

interface SectionDefinition<S extends SettingsSection> {
  key: string;
  label: string;
  description: string;
  schema: z.ZodType<SettingsSectionValues[S], z.ZodTypeDef, unknown>;
}

export const SETTINGS_SECTIONS: { [S in SettingsSection]: SectionDefinition<S> } = {
  llm: {
    key: 'llm_settings',
    label: 'LLM',
    description: 'LLM configuration settings',
    schema: LlmSettingsSchema,
  },
  rag: {
    key: 'rag_settings',
    label: 'RAG',
    description: 'RAG configuration settings',
    schema: RagSettingsSchema,
  },
  agentic: {
    key: 'agentic_settings',
    label: 'Agentic',
    description: 'Agentic AI configuration settings',
    schema: AgenticSettingsSchema,
  },
  graph_rag: {
    key: 'graph_rag_settings',
    label: 'Graph RAG',
    description: 'Graph RAG configuration settings',
    schema: GraphRagSettingsSchema,
  },
  embeddings: {
    key: 'embeddings_settings',
    label: 'Embeddings',
    description: 'Embeddings configuration settings',
    schema: EmbeddingsSettingsSchema,
  },
  core: {
    key: 'core_settings',
    label: 'Core',
    description: 'Core system configuration settings',
    schema: CoreSettingsSchema,
  },
};

export const SETTINGS_SECTION_NAMES: readonly SettingsSection[] = [
  'llm',
  'rag',
  'agentic',
  'graph_rag',
  'embeddings',
  'core',
];

// API keys

export const API_KEYS_CONFIG_KEY = 'api_keys';

export const NewApiKeySchema = z.object({
  name: z.string().trim().min(1, 'name is required'),
  service: z.string().trim().min(1, 'service is required').toLowerCase(),
  key: z.string().min(1, 'key is required'),
  organization_id: z.string().nullish(),
});

/**
 * Stored form: `key` holds ciphertext
 */
export interface ApiKeyRecord {
  id: number;
  name: string;
  service: string;
  key: string;
  organization_id: string | null;
  created_at: string;
}

export const ApiKeyStoreSchema = z.object({
  keys: z
    .array(
      z.object({
        id: z.number().int(),
        name: z.string(),
        service: z.string(),
        key: z.string(),
        organization_id: z.string().nullable().default(null),
        created_at: z.string(),
      })
    )
    .default([]),
});

/**
 * Raw row of the system_config table, decoded
 */
export interface SystemConfigEntry {
  key: string;
  value: unknown;
  description: string | null;
  isEncrypted: boolean;
  createdAt: string;
  updatedAt: string;
}
