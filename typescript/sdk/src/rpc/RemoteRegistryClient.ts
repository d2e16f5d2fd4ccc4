import type { Cb58Id, HexString, NodeId } from '@subnet-warp/utils';

import type {
  Blockchain,
  BlsSigner,
  SubnetRecord,
  Validator,
} from '../topology/types.js';

export interface CallOptions {
  signal?: AbortSignal;
  // Overrides the client's default request timeout
  timeoutMs?: number;
}

export interface NodeIdentity {
  nodeId: NodeId;
  signer?: BlsSigner;
}

export interface NodeAddress {
  ip: string;
  port: number;
}

export interface NodePeer {
  nodeId: NodeId;
  // Advertised public address, the port being the staking port
  publicIp: string;
  stakingPort: number;
  version?: string;
}

export interface NodeVersions {
  avalanchegoVersion: string;
  databaseVersion: string;
  gitCommit: string;
  vmVersions: Record<string, string>;
  rpcProtocolVersion?: string;
}

export interface NodeUptime {
  rewardingStakePercentage: number;
  weightedAveragePercentage: number;
}

/**
 * Read access to the network registry (P-Chain) and node APIs. Platform
 * calls take the P-Chain RPC URL, node calls the node's info API URL.
 *
 * Implementations make a single attempt per call and fail with
 * RemoteUnavailableError, MalformedResponseError or RpcApplicationError.
 */
export interface RemoteRegistryClient {
  listSubnets(platformUrl: string): Promise<SubnetRecord[]>;
  // Blockchains come back with empty `rpcUrl` and `vmType`
  listBlockchains(platformUrl: string): Promise<Blockchain[]>;
  listValidators(platformUrl: string, subnetId: Cb58Id): Promise<Validator[]>;
  listPendingValidators(
    platformUrl: string,
    subnetId: Cb58Id,
  ): Promise<Validator[]>;

  getNodeId(infoUrl: string, options?: CallOptions): Promise<NodeIdentity>;
  getNodeIp(infoUrl: string, options?: CallOptions): Promise<NodeAddress>;
  listPeers(
    infoUrl: string,
    nodeIds?: NodeId[],
    options?: CallOptions,
  ): Promise<NodePeer[]>;
  getNodeVersion(infoUrl: string): Promise<NodeVersions>;
  getNetworkName(infoUrl: string): Promise<string>;
  getNodeUptime(infoUrl: string): Promise<NodeUptime>;
  isBootstrapped(infoUrl: string, chain: string): Promise<boolean>;

  // Exactly WARP_SIGNATURE_LENGTH bytes
  getValidatorSignature(
    rpcUrl: string,
    messageId: Cb58Id,
    options?: CallOptions,
  ): Promise<HexString>;
}
