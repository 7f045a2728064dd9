import fetch, { FetchError, type Response } from 'node-fetch';
import type { ILLMProvider } from '../../../core/interfaces/ILLMProvider.js';
import type {
  ChatMessage,
  CompletionOptions,
  LLMCompletion,
  ProviderName,
} from '../../../core/entities/LLM.js';
import { LLMError, errorMessage } from '../../../core/errors.js';

export interface ProviderOptions {
  apiKey: string;
  model: string;
  baseUrl: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
}

export interface ResolvedCompletionOptions {
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

const DEFAULT_TEMPERATURE = 0.7;
const DEFAULT_MAX_TOKENS = 2000;
const DEFAULT_TIMEOUT_MS = 120_000;

/**
 * Shared plumbing for hosted provider adapters
 *
 * Subclasses implement chat(); the network-task helpers are expressed on top
 * of generateText() so every vendor gets them.
 */
export abstract class BaseLLMProvider implements ILLMProvider {
  abstract readonly name: ProviderName;

  constructor(protected readonly options: ProviderOptions) {}

  get model(): string {
    return this.options.model;
  }

  abstract chat(messages: ChatMessage[], options?: CompletionOptions): Promise<LLMCompletion>;

  async generateText(prompt: string, options?: CompletionOptions): Promise<string> {
    const completion = await this.chat([{ role: 'user', content: prompt }], options);
    return completion.content;
  }

  generateConfig(requirements: string, deviceType: string): Promise<string> {
    return this.generateText(
      `Generate a Cisco ${deviceType} configuration for the following requirements: ${requirements}`
    );
  }

  async validateConfig(config: string, requirements: string): Promise<{ validation_report: string }> {
    const report = await this.generateText(
      `Validate the following configuration against these requirements. Requirements: ${requirements}\n\nConfiguration:\n${config}`
    );
    return { validation_report: report };
  }

  troubleshootIssue(issueDescription: string, deviceInfo: Record<string, unknown>): Promise<string> {
    return this.generateText(
      `Troubleshoot the following network issue. Issue: ${issueDescription}\n\nDevice Info: ${JSON.stringify(deviceInfo)}`
    );
  }

  protected resolveOptions(options: CompletionOptions = {}): ResolvedCompletionOptions {
    return {
      temperature: options.temperature ?? this.options.temperature ?? DEFAULT_TEMPERATURE,
      maxTokens: options.maxTokens ?? this.options.maxTokens ?? DEFAULT_MAX_TOKENS,
      timeoutMs: options.timeoutMs ?? this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    };
  }

  protected endpoint(pathname: string): string {
    return `${this.options.baseUrl.replace(/\/+$/, '')}${pathname}`;
  }

  /**
   * POST a JSON body and return the parsed JSON response
   */
  protected async postJson(
    url: string,
    headers: Record<string, string>,
    body: unknown,
    timeoutMs: number
  ): Promise<unknown> {
    let res: Response;
    try {
      res = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...headers },
        body: JSON.stringify(body),
        timeout: timeoutMs,
      });
    } catch (error) {
      if (error instanceof FetchError && error.type === 'request-timeout') {
        throw new LLMError(`${this.name} request timed out after ${timeoutMs}ms`, this.name);
      }
      throw new LLMError(
        `${this.name} request failed: ${errorMessage(error)}`,
        this.name
      );
    }

    if (!res.ok) {
      const errText = await res.text().catch(() => '');
      throw new LLMError(`${this.name} ${res.status}: ${errText.substring(0, 200)}`, this.name);
    }

    try {
      return await res.json();
    } catch (error) {
      throw new LLMError(
        `${this.name} returned invalid JSON: ${errorMessage(error)}`,
        this.name
      );
    }
  }
}
