/**
 * Embedding backend strategies
 *
 * direct:        POST {input, model, dimensions} → {data: [{embedding}], usage}
 * orchestration: POST {input: {text}, config: {modules: {embeddings: {model}}}}
 *                → the same shapes, optionally wrapped in final_result
 *
 * The orchestration path is preferred whenever its deployment id is set.
 */

import { z } from 'zod';

import { ConfigurationError, EmbeddingServiceError } from '../../errors/index.js';
import type { EmbeddingBackend } from './types.js';

export interface BackendSettings {
  baseUrl?: string;
  orchestrationUrl?: string;
  embeddingDeploymentId?: string;
  orchestrationDeploymentId?: string;
  model: string;
  dimensions: number;
}

function trimSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

/**
 * Pick the backend once, from whichever deployment id is configured.
 *
 * @throws ConfigurationError when no deployment id (or its URL) is set
 */
export function selectBackend(settings: BackendSettings): EmbeddingBackend {
  const { model, dimensions } = settings;

  if (settings.orchestrationDeploymentId) {
    const root = settings.orchestrationUrl ?? settings.baseUrl;
    if (!root) {
      throw new ConfigurationError(
        'ORCHESTRATION_DEPLOYMENT_ID is set but neither ORCHESTRATION_URL nor INFERENCE_BASE_URL is'
      );
    }
    return {
      kind: 'orchestration',
      deploymentId: settings.orchestrationDeploymentId,
      url: `${trimSlash(root)}/v2/inference/deployments/${settings.orchestrationDeploymentId}/v2/embeddings`,
      model,
      dimensions,
    };
  }

  if (settings.embeddingDeploymentId) {
    if (!settings.baseUrl) {
      throw new ConfigurationError('EMBEDDING_DEPLOYMENT_ID is set but INFERENCE_BASE_URL is not');
    }
    return {
      kind: 'direct',
      deploymentId: settings.embeddingDeploymentId,
      url: `${trimSlash(settings.baseUrl)}/v2/inference/deployments/${settings.embeddingDeploymentId}/embeddings`,
      model,
      dimensions,
    };
  }

  throw new ConfigurationError(
    'No embedding deployment configured',
    'Set EMBEDDING_DEPLOYMENT_ID or ORCHESTRATION_DEPLOYMENT_ID'
  );
}

/**
 * Request body for one batch of texts.
 */
export function buildRequestBody(backend: EmbeddingBackend, texts: string[]): unknown {
  switch (backend.kind) {
    case 'direct':
      return { input: texts, model: backend.model, dimensions: backend.dimensions };
    case 'orchestration':
      return {
        input: { text: texts },
        config: {
          modules: {
            embeddings: {
              model: { name: backend.model, params: { dimensions: backend.dimensions } },
            },
          },
        },
      };
  }
}

// ============================================================================
// Response parsing
// ============================================================================

const VectorSchema = z.array(z.number().finite());

const DataShape = z.object({
  data: z.array(z.object({ embedding: VectorSchema, index: z.number().int().optional() })),
});

const EmbeddingsShape = z.object({
  embeddings: z.array(z.union([VectorSchema, z.object({ embedding: VectorSchema })])),
});

const WrappedShape = z.object({ final_result: z.unknown() });

function vectorsFrom(payload: unknown): number[][] | undefined {
  const data = DataShape.safeParse(payload);
  if (data.success) {
    const items = [...data.data.data];
    if (items.every((item) => item.index !== undefined)) {
      items.sort((a, b) => (a.index ?? 0) - (b.index ?? 0));
    }
    return items.map((item) => item.embedding);
  }

  const embeddings = EmbeddingsShape.safeParse(payload);
  if (embeddings.success) {
    return embeddings.data.embeddings.map((item) => (Array.isArray(item) ? item : item.embedding));
  }

  const bare = z.array(VectorSchema).safeParse(payload);
  return bare.success ? bare.data : undefined;
}

/**
 * Extract one vector per input from a response and check its shape.
 *
 * @throws EmbeddingServiceError when vectors are missing, non-numeric,
 *   miscounted or of the wrong dimensionality
 */
export function parseVectors(
  backend: EmbeddingBackend,
  payload: unknown,
  expectedCount: number
): number[][] {
  let body = payload;
  if (backend.kind === 'orchestration') {
    const wrapped = WrappedShape.safeParse(payload);
    if (wrapped.success && wrapped.data.final_result !== undefined) body = wrapped.data.final_result;
  }

  const vectors = vectorsFrom(body);
  if (vectors === undefined) {
    throw new EmbeddingServiceError(`Unrecognized ${backend.kind} embedding response`);
  }
  if (vectors.length !== expectedCount) {
    throw new EmbeddingServiceError(
      `Expected ${expectedCount} embeddings, received ${vectors.length}`
    );
  }
  vectors.forEach((vector, i) => {
    if (vector.length !== backend.dimensions) {
      throw new EmbeddingServiceError(
        `Embedding ${i} has ${vector.length} dimensions, expected ${backend.dimensions}`
      );
    }
  });
  return vectors;
}
