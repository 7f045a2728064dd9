import type { ProviderSettings } from '../../core/entities/LLM.js';
import { ProviderNotFoundError } from '../../core/errors.js';
import type { BaseLLMProvider } from './providers/BaseLLMProvider.js';
import { LLMFactory } from './LLMFactory.js';

/**
 * Named registry of provider adapters with one active entry
 */
export class LLMManager {
  private providers = new Map<string, BaseLLMProvider>();
  private currentName: string | null = null;

  /**
   * Registers a provider under `name`; an existing registration is kept as is.
   * The first provider added becomes the current one.
   */
  addProvider(name: string, settings: ProviderSettings): void {
    if (!this.providers.has(name)) {
      this.providers.set(name, LLMFactory.createProvider(settings));
    }
    if (this.currentName === null) {
      this.currentName = name;
    }
  }

  switchProvider(name: string): void {
    if (!this.providers.has(name)) {
      throw new ProviderNotFoundError(`Provider '${name}' not found. Please add it first.`);
    }
    this.currentName = name;
  }

  get currentProvider(): BaseLLMProvider {
    const provider = this.currentName === null ? undefined : this.providers.get(this.currentName);
    if (!provider) {
      throw new ProviderNotFoundError('No active LLM provider. Please add and switch to a provider.');
    }
    return provider;
  }

  get currentProviderName(): string | null {
    return this.currentName;
  }

  removeProvider(name: string): boolean {
    const removed = this.providers.delete(name);
    if (removed && this.currentName === name) {
      const next = this.providers.keys().next();
      this.currentName = next.done ? null : next.value;
    }
    return removed;
  }

  getProvider(name: string): BaseLLMProvider | undefined {
    return this.providers.get(name);
  }

  hasProvider(name: string): boolean {
    return this.providers.has(name);
  }

  listProviders(): string[] {
    return Array.from(this.providers.keys());
  }

  clear(): void {
    this.providers.clear();
    this.currentName = null;
  }
}
