export {
  ArtifactCacheError,
  CacheIoError,
  SerializationError,
  CacheCorruptionError,
  TransportError,
  HttpStatusError,
  TextDecodingError,
  isErrnoException,
  isNotFoundError,
} from './artifact-cache-error.js';

export type { ArtifactCacheErrorKind } from './artifact-cache-error.js';
