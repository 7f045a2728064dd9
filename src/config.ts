import * as dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError } from './core/errors.js';
import { PROVIDER_DEFAULTS, PROVIDER_NAMES, type ProviderName } from './core/entities/LLM.js';

// Load environment variables from .env file
dotenv.config();

const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'debug'] as const;

/**
 * Values shipped in .env.example that must not be sent to a provider
 */
const PLACEHOLDER_API_KEYS = new Set([
  'your_openai_api_key',
  'sk-your-openai-api-key-here',
  'your_groq_api_key',
  'your_openrouter_api_key',
  'your_anthropic_api_key',
  'sk-ant-REDACTED',
]);

export function isUsableApiKey(value: string | undefined | null): value is string {
  if (!value) return false;
  const trimmed = value.trim();
  return trimmed.length > 0 && !PLACEHOLDER_API_KEYS.has(trimmed);
}

const ProviderConfigSchema = z.object({
  apiKey: z.string().optional(),
  model: z.string().min(1, 'Model must not be empty'),
  baseUrl: z.string().url('Invalid provider URL format'),
});

// Zod validation schema
const ConfigSchema = z.object({
  server: z.object({
    name: z.string().min(1, 'Server name must not be empty'),
    version: z.string().min(1, 'Version must not be empty'),
    host: z.string().min(1),
    port: z.number().int().min(0).max(65535),
    debug: z.boolean(),
    publicDir: z.string().min(1),
  }),
  database: z.object({
    path: z.string().min(1, 'Database path must not be empty'),
  }),
  logging: z.object({
    level: z.enum(LOG_LEVELS),
    dir: z.string().optional(),
    silent: z.boolean(),
  }),
  security: z.object({
    secretKey: z.string().min(8, 'SECRET_KEY must be at least 8 characters'),
  }),
  providers: z.object({
    openai: ProviderConfigSchema,
    groq: ProviderConfigSchema,
    openrouter: ProviderConfigSchema,
    anthropic: ProviderConfigSchema,
  }),
  llm: z.object({
    defaultProvider: z.enum(PROVIDER_NAMES),
    fallbackOrder: z.array(z.enum(PROVIDER_NAMES)).min(1, 'At least 1 fallback provider is required'),
    temperature: z.number().min(0).max(2),
    maxTokens: z.number().int().min(1),
    timeoutMs: z.number().int().min(1000).max(600000),
  }),
  chat: z.object({
    contextWindow: z.number().int().min(0).max(100),
    maxHistory: z.number().int().min(1).max(1000),
    userId: z.string().min(1),
  }),
  devices: z.object({
    defaultSshPort: z.number().int().min(1).max(65535),
    defaultTelnetPort: z.number().int().min(1).max(65535),
    connectionTimeoutMs: z.number().int().min(100).max(60000),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse command line arguments
 * Usage: node dist/src/index.js --port 8000 --db-path ./data/netops.db --debug
 */
function parseArgs(argv: string[]): Record<string, string | boolean> {
  const args: Record<string, string | boolean> = {};

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);

      // Check if next arg is a value or another flag
      if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        args[key] = argv[++i];
      } else {
        args[key] = true;
      }
    }
  }

  return args;
}

/**
 * Get configuration from CLI arguments, environment variables or defaults
 * Validates configuration against schema and throws ConfigurationError if invalid
 */
export function getConfig(argv: string[] = process.argv, env: NodeJS.ProcessEnv = process.env): Config {
  const cliArgs = parseArgs(argv);

  // Helper to get value from CLI args or env, with type conversion
  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    if (typeof cliArgs[cliKey] === 'string') return String(cliArgs[cliKey]);
    return env[envKey] || defaultValue;
  };

  const getOptionalString = (cliKey: string, envKey: string): string | undefined => {
    const value = getString(cliKey, envKey, '');
    return value === '' ? undefined : value;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    if (cliArgs[cliKey] !== undefined) return cliArgs[cliKey] === true || cliArgs[cliKey] === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    if (typeof cliArgs[cliKey] === 'string') return Number(cliArgs[cliKey]);
    const envValue = env[envKey];
    return envValue ? Number(envValue) : defaultValue;
  };

  const getStringArray = (cliKey: string, envKey: string, defaultValue: string[]): string[] => {
    const value = typeof cliArgs[cliKey] === 'string' ? cliArgs[cliKey] : env[envKey];
    if (!value) return defaultValue;
    return String(value)
      .split(',')
      .map((s) => s.trim().toLowerCase())
      .filter((s) => s.length > 0);
  };

  const apiKey = (envKey: string): string | undefined => {
    const value = env[envKey];
    return isUsableApiKey(value) ? value.trim() : undefined;
  };

  const debug = getBoolean('debug', 'DEBUG', false);

  const rawConfig = {
    server: {
      name: getString('server-name', 'SERVER_NAME', 'genai-netops'),
      version: getString('server-version', 'SERVER_VERSION', '1.0.0'),
      host: getString('host', 'HOST', '0.0.0.0'),
      port: getNumber('port', 'PORT', 8000),
      debug,
      publicDir: path.resolve(getString('public-dir', 'PUBLIC_DIR', 'public')),
    },
    database: {
      path: getString('db-path', 'DATABASE_PATH', 'data/netops.db'),
    },
    logging: {
      level: getString('log-level', 'LOG_LEVEL', debug ? 'debug' : 'info'),
      dir: getOptionalString('log-dir', 'LOG_DIR'),
      silent: getBoolean('silent', 'LOG_SILENT', false),
    },
    security: {
      secretKey: getString('secret-key', 'SECRET_KEY', 'change-me-in-production'),
    },
    providers: {
      openai: {
        apiKey: apiKey('OPENAI_API_KEY'),
        model: getString('openai-model', 'OPENAI_MODEL', PROVIDER_DEFAULTS.openai.model),
        baseUrl: getString('openai-base-url', 'OPENAI_BASE_URL', PROVIDER_DEFAULTS.openai.baseUrl),
      },
      groq: {
        apiKey: apiKey('GROQ_API_KEY'),
        model: getString('groq-model', 'GROQ_MODEL', PROVIDER_DEFAULTS.groq.model),
        baseUrl: getString('groq-base-url', 'GROQ_BASE_URL', PROVIDER_DEFAULTS.groq.baseUrl),
      },
      openrouter: {
        apiKey: apiKey('OPENROUTER_API_KEY'),
        model: getString('openrouter-model', 'OPENROUTER_MODEL', PROVIDER_DEFAULTS.openrouter.model),
        baseUrl: getString('openrouter-base-url', 'OPENROUTER_BASE_URL', PROVIDER_DEFAULTS.openrouter.baseUrl),
      },
      anthropic: {
        apiKey: apiKey('ANTHROPIC_API_KEY'),
        model: getString('anthropic-model', 'ANTHROPIC_MODEL', PROVIDER_DEFAULTS.anthropic.model),
        baseUrl: getString('anthropic-base-url', 'ANTHROPIC_BASE_URL', PROVIDER_DEFAULTS.anthropic.baseUrl),
      },
    },
    llm: {
      defaultProvider: getString('provider', 'DEFAULT_LLM_PROVIDER', 'openai').toLowerCase(),
      fallbackOrder: getStringArray('fallback-order', 'LLM_FALLBACK_ORDER', [
        'groq',
        'openrouter',
        'openai',
        'anthropic',
      ]),
      temperature: getNumber('temperature', 'DEFAULT_TEMPERATURE', 0.7),
      maxTokens: getNumber('max-tokens', 'DEFAULT_MAX_TOKENS', 2000),
      timeoutMs: getNumber('llm-timeout', 'LLM_TIMEOUT_MS', 120000),
    },
    chat: {
      contextWindow: getNumber('context-window', 'CHAT_CONTEXT_WINDOW', 10),
      maxHistory: getNumber('max-history', 'MAX_CHAT_HISTORY', 50),
      userId: getString('user-id', 'DEFAULT_USER_ID', 'default_user'),
    },
    devices: {
      defaultSshPort: getNumber('ssh-port', 'DEFAULT_SSH_PORT', 22),
      defaultTelnetPort: getNumber('telnet-port', 'DEFAULT_TELNET_PORT', 23),
      connectionTimeoutMs: getNumber('connection-timeout', 'DEVICE_CONNECTION_TIMEOUT_MS', 5000),
    },
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    console.error('\n❌ Configuration Validation Failed!\n');
    console.error('Errors:');
    result.error.errors.forEach((err) => {
      const errPath = err.path.join('.');
      console.error(`  • ${errPath || 'root'}: ${err.message}`);
    });
    console.error('\n💡 Tips:');
    console.error('  - Check your .env file');
    console.error('  - Verify CLI arguments');
    console.error('  - Provider base URLs must be valid (e.g., https://api.openai.com/v1)');
    console.error();
    throw new ConfigurationError(
      `Invalid configuration: ${result.error.errors
        .map((err) => `${err.path.join('.') || 'root'}: ${err.message}`)
        .join('; ')}`
    );
  }

  return result.data;
}

export function configuredProviders(config: Config): ProviderName[] {
  return PROVIDER_NAMES.filter((name) => isUsableApiKey(config.providers[name].apiKey));
}

/**
 * Print configuration summary (secrets omitted)
 */
export function printConfigInfo(config: Config): void {
  console.error('╔════════════════════════════════════════════════════════════════════╗');
  console.error('║           GenAI Network Automation Backend - Configuration          ║');
  console.error('╚════════════════════════════════════════════════════════════════════╝');

  // Server info
  console.error(`\n📊 Server: ${config.server.name} v${config.server.version} ${config.server.debug ? '(Debug Mode)' : ''}`);
  console.error(`🔗 Listening: http://${config.server.host}:${config.server.port}`);
  console.error(`💾 Database: ${config.database.path}`);
  console.error(`📝 Logging: ${config.logging.level}${config.logging.dir ? ` (files in ${config.logging.dir})` : ''}`);

  // Providers
  const configured = configuredProviders(config);
  console.error(`\n🤖 Providers: ${configured.length} configured via environment`);
  PROVIDER_NAMES.forEach((name, idx) => {
    const icon = configured.includes(name) ? '✅' : '⚪';
    console.error(`   ${idx + 1}. ${icon} ${name} (${config.providers[name].model})`);
  });
  console.error(`   Primary: ${config.llm.defaultProvider} | Fallback: ${config.llm.fallbackOrder.join(' → ')}`);
  console.error(`   Temperature: ${config.llm.temperature} | Max tokens: ${config.llm.maxTokens} | Timeout: ${config.llm.timeoutMs}ms`);

  // Chat
  console.error(`\n💬 Chat: context ${config.chat.contextWindow} messages | history page ${config.chat.maxHistory}`);

  console.error('\n' + '─'.repeat(70));
}
