import path from 'path';
import { configuredProviders, getConfig, isUsableApiKey } from '../src/config.js';
import { ConfigurationError } from '../src/core/errors.js';

const ARGV = ['node', 'genai-netops'];

describe('getConfig', () => {
  let consoleError: jest.SpyInstance;

  beforeEach(() => {
    consoleError = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    consoleError.mockRestore();
  });

  test('should apply defaults when nothing is set', () => {
    const config = getConfig(ARGV, {});

    expect(config.server.port).toBe(8000);
    expect(config.server.host).toBe('0.0.0.0');
    expect(config.server.publicDir).toBe(path.resolve('public'));
    expect(config.database.path).toBe('data/netops.db');
    expect(config.logging.level).toBe('info');
    expect(config.llm.defaultProvider).toBe('openai');
    expect(config.llm.fallbackOrder).toEqual(['groq', 'openrouter', 'openai', 'anthropic']);
    expect(config.llm.timeoutMs).toBe(120000);
    expect(config.chat).toEqual({ contextWindow: 10, maxHistory: 50, userId: 'default_user' });
    expect(config.devices).toEqual({ defaultSshPort: 22, defaultTelnetPort: 23, connectionTimeoutMs: 5000 });
    expect(config.providers.groq).toEqual({
      apiKey: undefined,
      model: 'llama3-70b-8192',
      baseUrl: 'https://api.groq.com/openai/v1',
    });
  });

  test('should prefer CLI arguments over environment variables', () => {
    const config = getConfig([...ARGV, '--port', '9000', '--db-path', './tmp/test.db'], {
      PORT: '8100',
      DATABASE_PATH: 'env.db',
    });

    expect(config.server.port).toBe(9000);
    expect(config.database.path).toBe('./tmp/test.db');
  });

  test('should switch to debug logging with the --debug flag', () => {
    const config = getConfig([...ARGV, '--debug'], {});

    expect(config.server.debug).toBe(true);
    expect(config.logging.level).toBe('debug');
  });

  test('should ignore placeholder API keys', () => {
    const config = getConfig(ARGV, {
      OPENAI_API_KEY: 'your_openai_api_key',
      GROQ_API_KEY: 'test-groq-key',
      ANTHROPIC_API_KEY: '   ',
    });

    expect(config.providers.openai.apiKey).toBeUndefined();
    expect(config.providers.groq.apiKey).toBe('test-groq-key');
    expect(config.providers.anthropic.apiKey).toBeUndefined();
    expect(configuredProviders(config)).toEqual(['groq']);
  });

  test('should normalise the fallback order', () => {
    const config = getConfig(ARGV, { LLM_FALLBACK_ORDER: ' Anthropic, GROQ ,,' });
    expect(config.llm.fallbackOrder).toEqual(['anthropic', 'groq']);
  });

  test('should reject an unknown provider in the fallback order', () => {
    expect(() => getConfig(ARGV, { LLM_FALLBACK_ORDER: 'groq,mystery' })).toThrow(ConfigurationError);
    expect(() => getConfig(ARGV, { LLM_FALLBACK_ORDER: 'groq,mystery' })).toThrow(/llm\.fallbackOrder\.1/);
  });

  test('should reject an invalid provider URL', () => {
    expect(() => getConfig(ARGV, { OPENAI_BASE_URL: 'not a url' })).toThrow(
      'Invalid configuration: providers.openai.baseUrl: Invalid provider URL format'
    );
  });

  test('should reject a short secret key', () => {
    expect(() => getConfig(ARGV, { SECRET_KEY: 'short' })).toThrow(
      'Invalid configuration: security.secretKey: SECRET_KEY must be at least 8 characters'
    );
  });
});

describe('isUsableApiKey', () => {
  test('should accept real-looking keys only', () => {
    expect(isUsableApiKey('test-secret')).toBe(true);
    expect(isUsableApiKey('sk-ant-REDACTED')).toBe(false);
    expect(isUsableApiKey('')).toBe(false);
    expect(isUsableApiKey(undefined)).toBe(false);
    expect(isUsableApiKey(null)).toBe(false);
  });
});
