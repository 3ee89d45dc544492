/**
 * Test Utilities Module
 *
 * In-process fakes for the two remote services, plugged in through the
 * `fetch` option every client accepts.
 *
 * @example
 * ```typescript
 * import { FakeStorage, FakeInferenceService, FAKE_STORAGE_URL } from '../test-utils/index.js';
 *
 * const storage = new FakeStorage();
 * const gateway = new StorageGateway({ url: FAKE_STORAGE_URL, fetch: storage.fetch });
 * ```
 */

export {
  FakeInferenceService,
  fakeEmbedding,
  FAKE_AUTH_URL,
  FAKE_INFERENCE_URL,
  FAKE_CLIENT_ID,
  FAKE_CLIENT_SECRET,
  type FakeInferenceOptions,
  type RecordedRequest,
} from './fake-inference.js';

export {
  FakeStorage,
  FAKE_STORAGE_URL,
  type FakeTable,
  type FakeRow,
  type FakeStorageRequest,
} from './fake-storage.js';

export { createFakeProvider, type FakeProviderOptions } from './fake-provider.js';

export { FakeWeb, type FakePage } from './fake-web.js';

export {
  createTestServices,
  TEST_NOW,
  type TestServices,
  type TestServicesOptions,
} from './services.js';
