export {
  collectUntil,
  fetchWithTimeout,
  retryAsync,
  sleep,
} from './src/async.js';
export type { Collected, CollectUntilOptions } from './src/async.js';
export {
  NODE_ID_LENGTH,
  NODE_ID_PREFIX,
  cb58Decode,
  cb58Encode,
  cb58ToHex,
  hexOrCb58ToHex,
  isNodeId,
  nodeIdFromBytes,
  nodeIdToBytes,
} from './src/cb58.js';
export { safelyAccessEnvVar } from './src/env.js';
export {
  LogFormat,
  LogLevel,
  configureRootLogger,
  createSubnetWarpLogger,
  rootLogger,
  setRootLogger,
  toPinoLevel,
} from './src/logging.js';
export { deepCopy, indexBy } from './src/objects.js';
export { failure, success } from './src/result.js';
export type { Result } from './src/result.js';
export { errorToString, toEnvVarSegment } from './src/strings.js';
export type {
  Address,
  Cb58Id,
  HexString,
  NodeId,
} from './src/types.js';
export { isHttpUrl } from './src/url.js';
export { assert } from './src/validation.js';
export { tryParseJsonOrYaml } from './src/yaml.js';
