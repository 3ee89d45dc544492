/**
 * Environment Variable Handler
 *
 * Endpoints and credentials for the storage backend and the inference
 * service. Supports .env files for local development via dotenv.
 *
 * SECURITY NOTES:
 * - Secrets are NEVER logged, even in verbose mode
 * - Secrets are NEVER included in error messages
 * - Only presence/absence is reported
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// No-op if .env doesn't exist
dotenvConfig();

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

/** Blank values count as unset */
const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

/** Client credentials are often pasted with their quotes */
const credential = optionalString.transform((value) => {
  const stripped = value?.replace(/^["']+|["']+$/g, '');
  return stripped ? stripped : undefined;
});

export const EnvSchema = z.object({
  STORAGE_URL: optionalString.transform((value) => value ?? 'http://localhost:3000'),
  STORAGE_SERVICE_KEY: optionalString,
  INFERENCE_BASE_URL: optionalString,
  INFERENCE_AUTH_URL: optionalString,
  INFERENCE_CLIENT_ID: credential,
  INFERENCE_CLIENT_SECRET: credential,
  INFERENCE_RESOURCE_GROUP: optionalString.transform((value) => value ?? 'default'),
  EMBEDDING_DEPLOYMENT_ID: optionalString,
  ORCHESTRATION_DEPLOYMENT_ID: optionalString,
  ORCHESTRATION_URL: optionalString,
  EMBEDDING_MODEL: optionalString.transform((value) => value ?? 'text-embedding-3-large'),
  CHAT_MODEL: optionalString.transform((value) => value ?? 'gpt-4o'),
  CHAT_DEPLOYMENT_ID: optionalString,
});

export type EnvVars = z.infer<typeof EnvSchema>;

// ============================================================================
// PRIVATE STATE
// ============================================================================

/**
 * Cached environment variables (loaded once at first access).
 * _clearEnvCache() resets it between tests.
 */
let _envCache: EnvVars | null = null;

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load environment variables (called once, then cached).
 * Does NOT require anything to be set; consumers check what they need.
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  const source: Record<string, string | undefined> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    source[key] = process.env[key];
  }

  // Every field is an optional string, so only non-string input can fail
  _envCache = EnvSchema.parse(source);
  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Storage backend settings
 */
export interface StorageSettings {
  url: string;
  serviceKey?: string;
}

export function getStorageSettings(): StorageSettings {
  const env = loadEnv();
  return { url: env.STORAGE_URL, serviceKey: env.STORAGE_SERVICE_KEY };
}

/**
 * Inference service settings. Values may be missing; the embedding client
 * raises ConfigurationError for whatever it needs and does not find.
 */
export interface InferenceSettings {
  baseUrl?: string;
  authUrl?: string;
  clientId?: string;
  clientSecret?: string;
  resourceGroup: string;
  embeddingDeploymentId?: string;
  orchestrationDeploymentId?: string;
  orchestrationUrl?: string;
  embeddingModel: string;
  chatModel: string;
  chatDeploymentId?: string;
}

export function getInferenceSettings(): InferenceSettings {
  const env = loadEnv();
  return {
    baseUrl: env.INFERENCE_BASE_URL,
    authUrl: env.INFERENCE_AUTH_URL,
    clientId: env.INFERENCE_CLIENT_ID,
    clientSecret: env.INFERENCE_CLIENT_SECRET,
    resourceGroup: env.INFERENCE_RESOURCE_GROUP,
    embeddingDeploymentId: env.EMBEDDING_DEPLOYMENT_ID,
    orchestrationDeploymentId: env.ORCHESTRATION_DEPLOYMENT_ID,
    orchestrationUrl: env.ORCHESTRATION_URL ?? env.INFERENCE_BASE_URL,
    embeddingModel: env.EMBEDDING_MODEL,
    chatModel: env.CHAT_MODEL,
    chatDeploymentId: env.CHAT_DEPLOYMENT_ID,
  };
}

/**
 * Names of the inference variables that are required but unset.
 * Returns names only, never values.
 */
export function missingInferenceSettings(): string[] {
  const env = loadEnv();
  const missing: string[] = [];
  if (!env.INFERENCE_BASE_URL) missing.push('INFERENCE_BASE_URL');
  if (!env.INFERENCE_AUTH_URL) missing.push('INFERENCE_AUTH_URL');
  if (!env.INFERENCE_CLIENT_ID) missing.push('INFERENCE_CLIENT_ID');
  if (!env.INFERENCE_CLIENT_SECRET) missing.push('INFERENCE_CLIENT_SECRET');
  if (!env.EMBEDDING_DEPLOYMENT_ID && !env.ORCHESTRATION_DEPLOYMENT_ID) {
    missing.push('EMBEDDING_DEPLOYMENT_ID or ORCHESTRATION_DEPLOYMENT_ID');
  }
  return missing;
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to mock different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}

// ============================================================================
// SETUP INSTRUCTIONS
// ============================================================================

/**
 * Shown when required settings are missing.
 */
export const SETUP_INSTRUCTIONS: Record<'storage' | 'inference', string> = {
  storage: `
Point doc-retriever at your PostgREST endpoint in .env:

   STORAGE_URL="http://localhost:3000"
   STORAGE_SERVICE_KEY="your-service-key"
`.trim(),

  inference: `
Configure the inference service in .env:

   INFERENCE_BASE_URL="https://inference.example.com"
   INFERENCE_AUTH_URL="https://auth.example.com"
   INFERENCE_CLIENT_ID="your-client-id"
   INFERENCE_CLIENT_SECRET="your-client-secret"
   EMBEDDING_DEPLOYMENT_ID="your-deployment"      # direct embeddings
   # ORCHESTRATION_DEPLOYMENT_ID="your-deployment" # preferred when set
`.trim(),
};
