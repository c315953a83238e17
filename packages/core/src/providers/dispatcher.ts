/**
 * Provider Dispatcher
 *
 * Turns a ResolvedConfig into one HTTP call and a ProviderReply. One call
 * per dispatch; retries belong to the RetryController.
 */

import {
  ConnectionError,
  ProviderConfigMissingError,
  ProviderRequestError,
  RequestCancelledError,
  RequestTimeoutError,
} from '../errors.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import { systemClock, type Clock, type ProviderConfig, type ResolvedConfig } from '../types.js';
import { ProviderRegistry } from './factory.js';
import type { Provider, ProviderReply, WireRequest } from './types.js';

/**
 * Where the dispatcher finds credentials and endpoints.
 */
export interface ProviderConfigSource {
  /**
   * @throws {ProviderConfigMissingError} when the provider is not configured
   */
  get(provider: string): ProviderConfig;
}

/**
 * ProviderConfigSource over a fixed map.
 */
export class StaticProviderConfigs implements ProviderConfigSource {
  constructor(private readonly configs: Readonly<Record<string, ProviderConfig>>) {}

  get(provider: string): ProviderConfig {
    const config = this.configs[provider];
    if (!config) {
      throw new ProviderConfigMissingError(provider);
    }
    if (!config.apiKey) {
      throw new ProviderConfigMissingError(provider, 'no API key');
    }
    return config;
  }
}

export interface DispatchOptions {
  signal?: AbortSignal;
}

export interface ProviderDispatcherOptions {
  configs: ProviderConfigSource;
  providers?: ProviderRegistry;
  /** Replaces global fetch (tests, proxies) */
  fetch?: typeof fetch;
  clock?: Clock;
  logger?: Logger;
}

interface RawResponse {
  ok: boolean;
  status: number;
  text: string;
  retryAfter: string | null;
}

/**
 * Read a Retry-After header given either as seconds or as an HTTP date.
 */
export function parseRetryAfter(header: string | null, now: number): number | undefined {
  if (header === null || header.trim() === '') {
    return undefined;
  }
  const seconds = Number(header);
  if (!Number.isNaN(seconds)) {
    return Math.max(0, seconds * 1000);
  }
  const date = Date.parse(header);
  if (!Number.isNaN(date)) {
    return Math.max(0, date - now);
  }
  return undefined;
}

export class ProviderDispatcher {
  private readonly configs: ProviderConfigSource;
  private readonly providers: ProviderRegistry;
  private readonly fetchImpl: typeof fetch;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: ProviderDispatcherOptions) {
    this.configs = options.configs;
    this.providers = options.providers ?? new ProviderRegistry();
    this.fetchImpl = options.fetch ?? fetch;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * @throws {UnknownProviderError} when the provider name is not registered
   * @throws {ProviderConfigMissingError} when the provider has no credentials
   * @throws {RequestTimeoutError} when the call outlives the provider timeout
   * @throws {RequestCancelledError} when `signal` aborts the call
   * @throws {ConnectionError} when the provider cannot be reached
   * @throws {ProviderRequestError} on a non-2xx status or an unreadable body
   */
  async dispatch(config: ResolvedConfig, options: DispatchOptions = {}): Promise<ProviderReply> {
    const provider = this.providers.get(config.provider);

    if (provider.local && provider.respond) {
      this.logger.debug(`Answering locally with ${provider.name}`, { model: config.model });
      return provider.parseResponse(await provider.respond(config));
    }

    const providerConfig = this.configs.get(config.provider);
    const wire = provider.buildRequest(config, providerConfig);

    this.logger.debug(`POST ${redactKey(wire.url)}`, { provider: provider.name, model: config.model });

    const raw = await this.send(provider, wire, providerConfig.timeoutMs, options.signal);

    if (!raw.ok) {
      this.logger.debug(`${provider.name} returned HTTP ${raw.status}`);
      throw new ProviderRequestError(`${provider.name} returned HTTP ${raw.status}`, {
        provider: provider.name,
        status: raw.status,
        body: raw.text,
        retryAfterMs: parseRetryAfter(raw.retryAfter, this.clock.now()),
      });
    }

    let body: unknown;
    try {
      body = JSON.parse(raw.text);
    } catch (error) {
      throw new ProviderRequestError(`${provider.name} returned a body that is not JSON`, {
        provider: provider.name,
        status: raw.status,
        body: raw.text,
        kind: 'malformed',
        cause: error,
      });
    }

    return provider.parseResponse(body);
  }

  private async send(
    provider: Provider,
    wire: WireRequest,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<RawResponse> {
    if (signal?.aborted) {
      throw new RequestCancelledError();
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await this.fetchImpl(wire.url, {
        method: wire.method,
        headers: wire.headers,
        body: JSON.stringify(wire.body),
        signal: controller.signal,
      });
      return {
        ok: response.ok,
        status: response.status,
        text: await response.text(),
        retryAfter: response.headers.get('retry-after'),
      };
    } catch (error) {
      if (timedOut) {
        throw new RequestTimeoutError(provider.name, timeoutMs);
      }
      if (signal?.aborted) {
        throw new RequestCancelledError();
      }
      throw new ConnectionError(provider.name, error);
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

function redactKey(url: string): string {
  return url.replace(/([?&]key=)[^&]+/, '$1***');
}
