import type { ProviderGateway, ProviderGatewayFactory } from "./types.js";

/**
 * Constructed gateways keyed by provider, credential and timeout. Owned by
 * the session and cleared whenever the timeout changes, since clients keep
 * the timeout they were built with.
 */
export class ProviderCache {
  readonly #entries = new Map<string, ProviderGateway>();
  readonly #factory: ProviderGatewayFactory;

  constructor(factory: ProviderGatewayFactory) {
    this.#factory = factory;
  }

  get size(): number {
    return this.#entries.size;
  }

  getOrCreate(provider: string, apiKey: string, timeoutSeconds: number): ProviderGateway {
    const key = JSON.stringify([provider, apiKey, timeoutSeconds]);
    const cached = this.#entries.get(key);
    if (cached) {
      return cached;
    }
    const created = this.#factory(provider, apiKey, timeoutSeconds);
    this.#entries.set(key, created);
    return created;
  }

  clear(): void {
    this.#entries.clear();
  }
}
