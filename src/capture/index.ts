export {
  CaptureStore,
  DEFAULT_CAPTURE_CAPACITY,
  type CaptureFilters,
  type CaptureStoreOptions,
} from './store.js';
export {
  KeyedEncryptionService,
  type EncryptionService,
  type CustomDecryptor,
  type Cipher,
} from './encryption.js';
export { trackRequest, elapsedSince } from './tracked-request.js';
