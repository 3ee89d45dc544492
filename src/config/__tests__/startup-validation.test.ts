/**
 * Startup Validation Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  validateStartupConfig,
  getValidationOptionsForCommand,
} from '../startup-validation.js';

// ============================================================================
// Mocks
// ============================================================================

vi.mock('../loader.js', () => ({
  loadConfig: vi.fn(),
}));

vi.mock('../env.js', () => ({
  loadEnv: vi.fn(),
  missingInferenceSettings: vi.fn(),
  SETUP_INSTRUCTIONS: {
    storage: 'Set STORAGE_URL',
    inference: 'Set INFERENCE_*',
  },
}));

import { loadConfig } from '../loader.js';
import { loadEnv, missingInferenceSettings } from '../env.js';
import { ConfigurationError } from '../../errors/index.js';
import { DEFAULT_CONFIG } from '../defaults.js';

function envWith(overrides: { STORAGE_URL?: string; STORAGE_SERVICE_KEY?: string }) {
  return {
    STORAGE_URL: overrides.STORAGE_URL ?? 'http://localhost:3000',
    STORAGE_SERVICE_KEY: overrides.STORAGE_SERVICE_KEY,
    INFERENCE_RESOURCE_GROUP: 'default',
    EMBEDDING_MODEL: 'text-embedding-3-large',
    CHAT_MODEL: 'gpt-4o',
  };
}

// ============================================================================
// Tests
// ============================================================================

describe('validateStartupConfig', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(loadConfig).mockReturnValue(DEFAULT_CONFIG);
    vi.mocked(loadEnv).mockReturnValue(envWith({ STORAGE_SERVICE_KEY: 'test-key' }));
    vi.mocked(missingInferenceSettings).mockReturnValue([]);
  });

  it('is valid when everything is configured', () => {
    const result = validateStartupConfig();

    expect(result).toEqual({ valid: true, warnings: [], errors: [], hints: [] });
  });

  it('reports missing inference settings with the setup hint', () => {
    vi.mocked(missingInferenceSettings).mockReturnValue(['INFERENCE_CLIENT_ID']);

    const result = validateStartupConfig();

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      'Inference service not configured: missing INFERENCE_CLIENT_ID',
    ]);
    expect(result.hints).toEqual(['Set INFERENCE_*']);
  });

  it('skips inference checks when asked', () => {
    vi.mocked(missingInferenceSettings).mockReturnValue(['INFERENCE_CLIENT_ID']);

    expect(validateStartupConfig({ skipInference: true }).valid).toBe(true);
    expect(missingInferenceSettings).not.toHaveBeenCalled();
  });

  it('warns when the storage key is missing', () => {
    vi.mocked(loadEnv).mockReturnValue(envWith({}));

    const result = validateStartupConfig({ skipInference: true });

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([
      'STORAGE_SERVICE_KEY is not set; requests go out unauthenticated',
    ]);
  });

  it('rejects a storage URL that is not http(s)', () => {
    vi.mocked(loadEnv).mockReturnValue(
      envWith({ STORAGE_URL: 'localhost:3000', STORAGE_SERVICE_KEY: 'test-key' })
    );

    const result = validateStartupConfig({ skipInference: true });

    expect(result.errors).toEqual(['STORAGE_URL is not an http(s) URL: localhost:3000']);
  });

  it('turns config file errors into warnings', () => {
    vi.mocked(loadConfig).mockImplementation(() => {
      throw new ConfigurationError('Invalid TOML in config file: oops');
    });

    const result = validateStartupConfig({ skipStorage: true, skipInference: true });

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual(['Invalid TOML in config file: oops']);
  });
});

describe('getValidationOptionsForCommand', () => {
  it('checks storage and inference for ingest', () => {
    expect(getValidationOptionsForCommand('ingest')).toEqual({
      skipStorage: false,
      skipInference: false,
    });
  });

  it('checks only storage for sources', () => {
    expect(getValidationOptionsForCommand('sources')).toEqual({
      skipStorage: false,
      skipInference: true,
    });
  });

  it('skips everything for config', () => {
    expect(getValidationOptionsForCommand('config')).toEqual({
      skipStorage: true,
      skipInference: true,
    });
  });
});
