export {
  DEFAULT_AGGREGATION_CONCURRENCY,
  DEFAULT_PEER_DISCOVERY_TIMEOUT_MS,
  DEFAULT_SIGNATURE_ATTEMPTS,
  DEFAULT_SIGNATURE_RETRY_MS,
  DEFAULT_SIGNATURE_TIMEOUT_MS,
  SignatureAggregator,
} from './aggregation/SignatureAggregator.js';
export type { SignatureAggregatorOptions } from './aggregation/SignatureAggregator.js';
export {
  defaultRpcPath,
  formatRpcEndpoint,
  parseRpcEndpoint,
  peerRpcUrl,
} from './aggregation/endpoint.js';
export type { RpcEndpoint, RpcScheme } from './aggregation/endpoint.js';
export {
  CONFIG_PATH_ENV_VAR,
  applyRpcUrlOverrides,
  defaultConfigPath,
  loadNetworkConfig,
  readConfig,
  resolveConfigPath,
  rpcUrlEnvVar,
} from './config/loader.js';
export {
  BlockchainConfigSchema,
  NetworkConfigSchema,
  SubnetConfigSchema,
  SubnetWarpConfigSchema,
} from './config/schema.js';
export type {
  BlockchainConfig,
  NetworkConfig,
  SubnetConfig,
  SubnetWarpConfig,
} from './config/schema.js';
export {
  C_CHAIN_NAME,
  DEFAULT_HTTPS_PORT,
  DEFAULT_HTTP_PORT,
  DEFAULT_STAKING_PORT,
  INFO_API_PATH,
  NOT_A_VALIDATOR_ERROR_CODE,
  PRIMARY_NETWORK_ID,
  P_CHAIN_NAME,
  WARP_ANYCAST_ID,
  WARP_SIGNATURE_LENGTH,
  X_CHAIN_NAME,
} from './consts/network.js';
export {
  ErrorKind,
  InvalidConfigError,
  InvalidRpcUrlError,
  MalformedResponseError,
  NotFoundError,
  OperationNotAllowedError,
  PayloadIntegrityError,
  PayloadTooShortError,
  PeerNotFoundError,
  RemoteUnavailableError,
  RpcApplicationError,
  SubnetWarpError,
  UnknownSourceChainError,
  isSubnetWarpError,
} from './errors.js';
export type { LookupScope } from './errors.js';
export { EndpointNode, ZERO_UPTIME } from './nodes/EndpointNode.js';
export type { EndpointNodeOptions } from './nodes/EndpointNode.js';
export {
  JsonRpcRegistryClient,
  parseHostPort,
} from './rpc/JsonRpcRegistryClient.js';
export {
  DEFAULT_REQUEST_TIMEOUT_MS,
  JsonRpcTransport,
} from './rpc/JsonRpcTransport.js';
export type {
  JsonRpcParams,
  JsonRpcRequestOptions,
  JsonRpcTransportOptions,
} from './rpc/JsonRpcTransport.js';
export type {
  CallOptions,
  NodeAddress,
  NodeIdentity,
  NodePeer,
  NodeUptime,
  NodeVersions,
  RemoteRegistryClient,
} from './rpc/RemoteRegistryClient.js';
export { Network } from './topology/Network.js';
export type { LoadNetworkOptions, NetworkOptions } from './topology/Network.js';
export { Subnet, SubnetOperation } from './topology/Subnet.js';
export {
  EVM_VM_TYPES,
  getEthersProvider,
  isEvmBlockchain,
} from './topology/blockchain.js';
export { classifySubnet } from './topology/classify.js';
export {
  mergeBlockchains,
  mergeSubnets,
  replacePendingValidators,
  replaceValidators,
} from './topology/reconcile.js';
export { SubnetType } from './topology/types.js';
export type {
  Blockchain,
  BlsSigner,
  Delegator,
  OutputOwners,
  SubnetData,
  SubnetRecord,
  Validator,
} from './topology/types.js';
export { SubnetEvmWarpMessage } from './warp/SubnetEvmWarpMessage.js';
export { WarpMessage } from './warp/WarpMessage.js';
export type { VerifiedWarpMessage } from './warp/WarpMessage.js';
export {
  ADDRESSED_PAYLOAD_MIN_LENGTH,
  UNSIGNED_MESSAGE_HEADER_LENGTH,
  decodeAddressedPayload,
  decodeSubnetEvmUnsignedMessage,
  decodeUnsignedMessage,
  encodeAddressedPayload,
  encodeUnsignedMessage,
  warpMessageId,
} from './warp/codec.js';
export { WarpMessageStatusType, WarpPayloadType } from './warp/types.js';
export type {
  AddressedPayload,
  SubnetEvmWarpMessageFields,
  ValidatorSignature,
  WarpLogLike,
  WarpMessageStatus,
  WarpPayload,
  WarpUnsignedMessage,
} from './warp/types.js';
