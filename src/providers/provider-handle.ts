import type { LLMProvider } from './llm-provider';
import { createProvider, type ProviderOptions } from './provider-factory';
import type { EnvConfig } from '../schemas/env-schemas';
import { hasProviderCredential } from '../boundaries/env-parser';
import { ConfigError } from '../errors/index';
import { debug } from '../output/logger';

/**
 * Explicit handle on the shared model client. The client is built on the first
 * get() and reused afterwards; construction is synchronous, so concurrent callers
 * on the event loop can never build it twice.
 *
 * A handle without a factory is "not configured": callers use local fallbacks.
 */
export class ProviderHandle {
  private instance: LLMProvider | undefined;

  constructor(private readonly factory?: () => LLMProvider) {}

  static fromEnvironment(env: EnvConfig, options: ProviderOptions = {}): ProviderHandle {
    if (!hasProviderCredential(env)) {
      return ProviderHandle.unconfigured();
    }
    return new ProviderHandle(() => createProvider(env, options));
  }

  static unconfigured(): ProviderHandle {
    return new ProviderHandle();
  }

  static of(provider: LLMProvider): ProviderHandle {
    return new ProviderHandle(() => provider);
  }

  isConfigured(): boolean {
    return this.factory !== undefined;
  }

  /**
   * @throws ConfigError when no provider is configured
   */
  get(): LLMProvider {
    if (this.instance) {
      return this.instance;
    }
    if (!this.factory) {
      throw new ConfigError('No LLM provider configured');
    }
    const provider = this.factory();
    this.instance = provider;
    debug(`Initialized ${provider.name} client with model: ${provider.modelId}`);
    return provider;
  }
}
