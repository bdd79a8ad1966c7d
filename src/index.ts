/**
 * Conftest config audit plugin - public API
 *
 * @module index
 */

export * from './config';
export * from './plugin/types';
export {
  ConftestPlugin,
  createConftestPlugin,
  type ConftestPluginOptions,
} from './plugin/conftest';
export {
  CONFTEST_CONTAINER_NAME,
  POLICY_FILES,
  WORKLOAD_KEY,
  SerializationError,
} from './plugin/conftest/job-spec';
export { ParseError, SCANNER_NAME, SCANNER_VENDOR } from './plugin/conftest/result';
export { VersionError, getVersionFromImageRef, parseImageRef, type ImageRef } from './utils/image-ref';
export { SystemClock, FixedClock, UUIDGenerator, type Clock, type IDGenerator } from './utils/ext';
export { Logger } from './utils/logger';
