// Cache
export {
  HTTP_CACHE_NAMESPACE,
  DATA_FILE_NAME,
  METADATA_FILE_NAME,
  deriveCacheKey,
  cacheEntryPaths,
} from './cache/cache-key.js';
export type { CacheEntryPaths } from './cache/cache-key.js';
export {
  parseCacheControl,
  deriveCacheControlPolicy,
} from './cache/cache-control-parser.js';
export type {
  CacheControlDirectives,
  CacheControlPolicy,
} from './cache/cache-control-parser.js';
export {
  MetadataRecordSchema,
  collectRawHeaders,
  buildCacheMetadata,
  createCacheMetadata,
  toMetadataRecord,
  fromMetadataRecord,
} from './cache/cache-metadata.js';
export type {
  CacheValidators,
  CacheMetadata,
  MetadataRecord,
} from './cache/cache-metadata.js';
export {
  evaluateValidators,
  conditionalRequestHeaders,
} from './cache/cache-policy.js';
export { FileMetadataStore } from './cache/metadata-store.js';
export type {
  MetadataStore,
  FileMetadataStoreOptions,
} from './cache/metadata-store.js';
export { writeFileAtomic, streamToFileAtomic } from './cache/atomic-write.js';

// Stores
export { InProcessEntryLock } from './stores/entry-lock.js';
export type { EntryLock } from './stores/entry-lock.js';

// HTTP cache
export { HttpCache } from './http-cache/http-cache.js';
export type {
  HttpCacheStores,
  HttpCacheOptions,
} from './http-cache/http-cache.js';
export {
  CachedArtifact,
  charsetFromContentType,
} from './http-cache/cached-artifact.js';
export type {
  ArtifactStatus,
  CachedArtifactInit,
} from './http-cache/cached-artifact.js';
export type {
  CacheType,
  HttpTransport,
  CachedFetchOptions,
  HttpCacheContract,
} from './types/http-cache.js';

// Integrity
export {
  SUPPORTED_CHECKSUM_ALGORITHMS,
  resolveChecksumAlgorithm,
} from './integrity/checksum-algorithms.js';
export type { ChecksumAlgorithm } from './integrity/checksum-algorithms.js';
export { verifyFile } from './integrity/integrity-verifier.js';
export type {
  VerificationOutcome,
  VerificationProgress,
  VerifyFileOptions,
} from './integrity/integrity-verifier.js';
export { verifyFiles, describeOutcome } from './integrity/batch-verify.js';
export type {
  FileVerificationResult,
  VerificationReport,
  VerifyFilesOptions,
} from './integrity/batch-verify.js';

// Manifest
export {
  ManifestSchema,
  loadManifest,
  resolveFileUrl,
  fetchFiles,
} from './manifest/manifest.js';
export type { Manifest, FetchFilesOptions } from './manifest/manifest.js';
export type { DownloadFile } from './types/download-file.js';

// Configuration
export {
  APP_NAMESPACE,
  DEFAULT_CHUNK_SIZE,
  CacheConfigSchema,
  platformCacheDir,
  defaultCacheDir,
  resolveCacheConfig,
} from './config.js';
export type { CacheConfig, CacheConfigInput } from './config.js';

// Logging
export { createLogger, defaultLogger, isLogLevel } from './logger.js';
export type { Logger, LogLevel, CreateLoggerOptions } from './logger.js';

// Errors
export * from './errors/index.js';
