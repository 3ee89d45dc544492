/**
 * Services wired to in-process fakes, for tool and command tests.
 */

import { DEFAULT_CONFIG, type Config } from '../config/index.js';
import { Services } from '../services.js';
import { createFakeProvider, type FakeProviderOptions } from './fake-provider.js';
import { FakeStorage, FAKE_STORAGE_URL } from './fake-storage.js';
import { FakeWeb } from './fake-web.js';

export const TEST_NOW = new Date('2026-03-01T00:00:00.000Z');

export interface TestServicesOptions {
  /** Adjust the config before the services are built */
  configure?: (config: Config) => void;
  provider?: FakeProviderOptions;
}

export interface TestServices {
  services: Services;
  storage: FakeStorage;
  web: FakeWeb;
  embedder: ReturnType<typeof createFakeProvider>;
  config: Config;
}

/**
 * Small chunks (100/20) so short fixtures still produce several chunks.
 */
export function createTestServices(options: TestServicesOptions = {}): TestServices {
  const config = structuredClone(DEFAULT_CONFIG);
  config.chunking = { chunk_size: 100, chunk_overlap: 20 };
  options.configure?.(config);

  const storage = new FakeStorage();
  const web = new FakeWeb();
  const embedder = createFakeProvider(options.provider);

  const services = new Services(config, {
    storage: { url: FAKE_STORAGE_URL },
    inference: { resourceGroup: 'default', embeddingModel: 'fake-model', chatModel: 'fake-chat' },
    fetch: { storage: storage.fetch, web: web.fetch },
    embedder,
    now: () => TEST_NOW,
  });

  return { services, storage, web, embedder, config };
}
