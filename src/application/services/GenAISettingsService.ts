import type { ISettingsRepository } from '../../core/interfaces/ISettingsRepository.js';
import {
  API_KEYS_CONFIG_KEY,
  ApiKeyRecord,
  ApiKeyStoreSchema,
  NewApiKeySchema,
  SETTINGS_SECTIONS,
  SETTINGS_SECTION_NAMES,
  SettingsSection,
  SettingsSectionValues,
} from '../../core/entities/Settings.js';
import { isProviderName, PROVIDER_DEFAULTS } from '../../core/entities/LLM.js';
import { NotFoundError, ValidationError, errorMessage } from '../../core/errors.js';
import type { Config } from '../../config.js';
import { LLMFactory } from '../../infrastructure/llm/LLMFactory.js';
import type { SecretBox } from '../../utils/secrets.js';
import { maskSecret } from '../../utils/secrets.js';
import { isPlainObject } from '../../utils/json.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('GenAISettingsService');

export type AllSettings = SettingsSectionValues & { api_keys: { keys: ApiKeyRecord[] } };

/**
 * Values a section starts from before anything is stored; the schema fills the rest
 */
export type SectionSeeds = { [S in SettingsSection]?: Record<string, unknown> };

/**
 * Seeds taken from the environment: default provider and its model, sampling and timeout
 */
export function sectionSeedsFromConfig({ llm, providers }: Pick<Config, 'llm' | 'providers'>): SectionSeeds {
  return {
    llm: {
      primary_llm: providers[llm.defaultProvider].model,
      temperature: llm.temperature,
      max_tokens: llm.maxTokens,
      timeout_settings: Math.max(1, Math.round(llm.timeoutMs / 1000)),
    },
    core: {
      default_chat_provider: llm.defaultProvider,
      default_config_generation_provider: llm.defaultProvider,
      default_analysis_provider: llm.defaultProvider,
    },
  };
}

export interface ConnectionTestResult {
  status: 'success' | 'error';
  message: string;
}

/**
 * Service for the GenAI settings sections and stored provider API keys
 */
export class GenAISettingsService {
  constructor(
    private settingsRepo: ISettingsRepository,
    private secrets: SecretBox,
    private providers: Config['providers'],
    private seeds: SectionSeeds = {}
  ) {}

  /**
   * Stored value, or the section defaults when nothing was saved yet
   */
  getSection<S extends SettingsSection>(section: S): SettingsSectionValues[S] {
    const definition = SETTINGS_SECTIONS[section];
    const seed = this.seeds[section] ?? {};
    const stored = this.settingsRepo.get(definition.key)?.value;
    const parsed = definition.schema.safeParse(isPlainObject(stored) ? { ...seed, ...stored } : stored ?? seed);
    if (!parsed.success) {
      logger.warn(`Stored ${definition.key} is invalid, using defaults`, { issues: parsed.error.errors.length });
      return definition.schema.parse(seed);
    }
    return parsed.data;
  }

  /**
   * Merges a partial body over the stored value and validates the result
   */
  private mergeSection<S extends SettingsSection>(section: S, body: unknown): SettingsSectionValues[S] {
    if (!isPlainObject(body)) {
      throw new ValidationError(`${SETTINGS_SECTIONS[section].label} settings must be a JSON object`);
    }
    return SETTINGS_SECTIONS[section].schema.parse({ ...this.getSection(section), ...body });
  }

  updateSection<S extends SettingsSection>(
    section: S,
    body: unknown
  ): { message: string; settings: SettingsSectionValues[S] } {
    const definition = SETTINGS_SECTIONS[section];
    const settings = this.mergeSection(section, body);

    this.settingsRepo.upsert(definition.key, settings, definition.description);
    logger.info(`${definition.label} settings updated`);

    return { message: `${definition.label} settings updated successfully`, settings };
  }

  getAll(): AllSettings {
    return {
      llm: this.getSection('llm'),
      rag: this.getSection('rag'),
      agentic: this.getSection('agentic'),
      graph_rag: this.getSection('graph_rag'),
      embeddings: this.getSection('embeddings'),
      core: this.getSection('core'),
      api_keys: this.listApiKeys(),
    };
  }

  /**
   * Updates every section present in the body; api_keys are managed separately
   */
  updateAll(body: unknown): { message: string; settings: AllSettings } {
    if (!isPlainObject(body)) {
      throw new ValidationError('Settings must be a JSON object');
    }

    // Every section is validated before anything is written
    const updates: Array<{ section: SettingsSection; settings: unknown }> = [];
    for (const section of SETTINGS_SECTION_NAMES) {
      if (body[section] !== undefined) {
        updates.push({ section, settings: this.mergeSection(section, body[section]) });
      }
    }

    this.settingsRepo.transaction(() => {
      for (const { section, settings } of updates) {
        const definition = SETTINGS_SECTIONS[section];
        this.settingsRepo.upsert(definition.key, settings, definition.description);
      }
    });
    logger.info('GenAI settings updated', { sections: updates.map((u) => u.section) });

    return { message: 'GenAI settings updated successfully', settings: this.getAll() };
  }

  // API keys

  private loadKeys(): ApiKeyRecord[] {
    const stored = this.settingsRepo.get(API_KEYS_CONFIG_KEY);
    if (!stored) return [];
    return ApiKeyStoreSchema.parse(stored.value).keys;
  }

  private saveKeys(keys: ApiKeyRecord[]): void {
    this.settingsRepo.upsert(API_KEYS_CONFIG_KEY, { keys }, 'API keys configuration', true);
  }

  listApiKeys(): { keys: ApiKeyRecord[] } {
    return {
      keys: this.loadKeys().map((record) => ({ ...record, key: maskSecret(this.decryptKey(record)) })),
    };
  }

  addApiKey(body: unknown): { message: string; id: number } {
    const input = NewApiKeySchema.parse(body);
    const keys = this.loadKeys();

    const record: ApiKeyRecord = {
      id: keys.reduce((max, k) => Math.max(max, k.id), 0) + 1,
      name: input.name,
      service: input.service,
      key: this.secrets.encrypt(input.key),
      organization_id: input.organization_id ?? null,
      created_at: new Date().toISOString(),
    };

    this.saveKeys([...keys, record]);
    logger.info(`API key added for ${record.service}`, { id: record.id });

    return { message: `API key '${record.name}' added successfully`, id: record.id };
  }

  deleteApiKey(id: number): { message: string } {
    const stored = this.settingsRepo.get(API_KEYS_CONFIG_KEY);
    if (!stored) {
      throw new NotFoundError('No API keys found');
    }

    const keys = this.loadKeys();
    const remaining = keys.filter((k) => k.id !== id);
    if (remaining.length === keys.length) {
      throw new NotFoundError('API key not found');
    }

    this.saveKeys(remaining);
    return { message: `API key ${id} deleted successfully` };
  }

  /**
   * Newest stored key for a service, decrypted
   */
  resolveApiKey(service: string): string | null {
    const wanted = service.toLowerCase();
    const matches = this.loadKeys().filter((k) => k.service === wanted);
    const newest = matches.reduce<ApiKeyRecord | null>(
      (latest, k) => (latest === null || k.id > latest.id ? k : latest),
      null
    );
    if (!newest) return null;

    try {
      return this.secrets.decrypt(newest.key);
    } catch (error) {
      logger.warn(`Stored API key ${newest.id} could not be decrypted`, {
        error: errorMessage(error),
      });
      return null;
    }
  }

  private decryptKey(record: ApiKeyRecord): string {
    try {
      return this.secrets.decrypt(record.key);
    } catch (error) {
      logger.warn(`Stored API key ${record.id} could not be decrypted`, {
        error: errorMessage(error),
      });
      return '';
    }
  }

  /**
   * One 5-token request through a throwaway adapter
   */
  async testConnection(provider: string, apiKey: string): Promise<ConnectionTestResult> {
    const name = provider.trim().toLowerCase();
    if (!isProviderName(name)) {
      return { status: 'error', message: `Provider ${provider} not supported` };
    }

    try {
      const adapter = LLMFactory.createProvider({
        provider: name,
        apiKey,
        model: this.providers[name].model,
        baseUrl: this.providers[name].baseUrl,
        maxTokens: 5,
        timeoutMs: 30_000,
      });
      await adapter.generateText('Test connection');
      return { status: 'success', message: `${PROVIDER_DEFAULTS[name].label} connection successful` };
    } catch (error) {
      const message = errorMessage(error);
      logger.error(`API connection test failed: ${message}`, { provider: name });
      return { status: 'error', message };
    }
  }
}
