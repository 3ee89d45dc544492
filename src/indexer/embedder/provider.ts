/**
 * Embedding Provider Factory
 *
 * Builds the EmbeddingClient from the [embedding] config section and the
 * inference settings read from the environment.
 */

import type { Config, InferenceSettings } from '../../config/index.js';
import type { Logger } from '../../utils/index.js';
import { EmbeddingClient } from './client.js';
import type { FetchFn } from './types.js';

export interface ProviderOptions {
  fetch?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

/**
 * @example
 * ```typescript
 * const client = createEmbeddingProvider(loadConfig().embedding, getInferenceSettings());
 * const { embedding } = await client.embed('How do I configure retries?');
 * ```
 *
 * @throws ConfigurationError when required settings are missing
 */
export function createEmbeddingProvider(
  config: Config['embedding'],
  settings: InferenceSettings,
  options: ProviderOptions = {}
): EmbeddingClient {
  return new EmbeddingClient({
    baseUrl: settings.baseUrl,
    authUrl: settings.authUrl,
    clientId: settings.clientId,
    clientSecret: settings.clientSecret,
    resourceGroup: settings.resourceGroup,
    embeddingDeploymentId: settings.embeddingDeploymentId,
    orchestrationDeploymentId: settings.orchestrationDeploymentId,
    orchestrationUrl: settings.orchestrationUrl,
    model: settings.embeddingModel,
    dimensions: config.dimensions,
    batchSize: config.batch_size,
    timeoutMs: config.timeout_ms,
    retry: { maxAttempts: config.max_attempts, baseDelayMs: config.base_delay_ms },
    tokenMarginSeconds: config.token_margin_seconds,
    fetch: options.fetch,
    sleep: options.sleep,
    logger: options.logger,
  });
}
