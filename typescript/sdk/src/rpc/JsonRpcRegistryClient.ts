import { dataLength } from 'ethers';
import type { Logger } from 'pino';

import {
  Cb58Id,
  HexString,
  NodeId,
  errorToString,
  rootLogger,
} from '@subnet-warp/utils';

import { WARP_SIGNATURE_LENGTH } from '../consts/network.js';
import { MalformedResponseError } from '../errors.js';
import type { Blockchain, SubnetRecord, Validator } from '../topology/types.js';

import {
  JsonRpcTransport,
  JsonRpcTransportOptions,
} from './JsonRpcTransport.js';
import type {
  CallOptions,
  NodeAddress,
  NodeIdentity,
  NodePeer,
  NodeUptime,
  NodeVersions,
  RemoteRegistryClient,
} from './RemoteRegistryClient.js';
import {
  GetBlockchainsResultSchema,
  GetNetworkNameResultSchema,
  GetNodeIdResultSchema,
  GetNodeIpResultSchema,
  GetNodeVersionResultSchema,
  GetSubnetsResultSchema,
  GetValidatorsResultSchema,
  IsBootstrappedResultSchema,
  PeersResultSchema,
  UptimeResultSchema,
  ValidatorResult,
  WarpSignatureResultSchema,
} from './schemas.js';

/**
 * Splits `host:port` as returned by `info.getNodeIP` and `info.peers`.
 * IPv6 hosts are bracketed.
 */
export function parseHostPort(value: string, method: string): NodeAddress {
  const separator = value.lastIndexOf(':');
  const port = Number(value.slice(separator + 1));
  if (separator <= 0 || !Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new MalformedResponseError(method, `invalid address '${value}'`);
  }
  return { ip: value.slice(0, separator).replace(/^\[(.*)\]$/, '$1'), port };
}

function toValidator(result: ValidatorResult, subnetId: Cb58Id): Validator {
  return {
    txId: result.txID,
    nodeId: result.nodeID,
    subnetId,
    startTime: result.startTime,
    endTime: result.endTime,
    stakeAmount: result.stakeAmount,
    weight: result.weight,
    potentialReward: result.potentialReward,
    delegationFee: result.delegationFee,
    connected: result.connected,
    uptime: result.uptime,
    validationRewardOwner: result.validationRewardOwner,
    delegatorCount: result.delegatorCount,
    delegatorWeight: result.delegatorWeight,
    delegators: result.delegators?.map((delegator) => ({
      txId: delegator.txID,
      nodeId: delegator.nodeID,
      startTime: delegator.startTime,
      endTime: delegator.endTime,
      stakeAmount: delegator.stakeAmount,
      potentialReward: delegator.potentialReward,
      rewardOwner: delegator.rewardOwner,
    })),
    delegationRewardOwner: result.delegationRewardOwner,
    signer: result.signer,
  };
}

export class JsonRpcRegistryClient implements RemoteRegistryClient {
  protected readonly transport: JsonRpcTransport;
  protected readonly logger: Logger;

  constructor(options: JsonRpcTransportOptions = {}) {
    this.logger =
      options.logger ?? rootLogger.child({ module: 'JsonRpcRegistryClient' });
    this.transport = new JsonRpcTransport({ ...options, logger: this.logger });
  }

  async listSubnets(platformUrl: string): Promise<SubnetRecord[]> {
    const { subnets } = await this.transport.request(
      platformUrl,
      'platform.getSubnets',
      {},
      GetSubnetsResultSchema,
    );
    return subnets.map(({ id, controlKeys, threshold }) => ({
      id,
      controlKeys,
      threshold,
    }));
  }

  async listBlockchains(platformUrl: string): Promise<Blockchain[]> {
    const { blockchains } = await this.transport.request(
      platformUrl,
      'platform.getBlockchains',
      {},
      GetBlockchainsResultSchema,
    );
    return blockchains.map((chain) => ({
      id: chain.id,
      name: chain.name,
      subnetId: chain.subnetID,
      vmId: chain.vmID,
      vmType: '',
      rpcUrl: '',
    }));
  }

  async listValidators(
    platformUrl: string,
    subnetId: Cb58Id,
  ): Promise<Validator[]> {
    const { validators } = await this.transport.request(
      platformUrl,
      'platform.getCurrentValidators',
      { subnetID: subnetId },
      GetValidatorsResultSchema,
    );
    return validators.map((v) => toValidator(v, subnetId));
  }

  async listPendingValidators(
    platformUrl: string,
    subnetId: Cb58Id,
  ): Promise<Validator[]> {
    const { validators } = await this.transport.request(
      platformUrl,
      'platform.getPendingValidators',
      { subnetID: subnetId },
      GetValidatorsResultSchema,
    );
    return validators.map((v) => toValidator(v, subnetId));
  }

  async getNodeId(
    infoUrl: string,
    options?: CallOptions,
  ): Promise<NodeIdentity> {
    const { nodeID, nodePOP } = await this.transport.request(
      infoUrl,
      'info.getNodeID',
      undefined,
      GetNodeIdResultSchema,
      options,
    );
    return { nodeId: nodeID, signer: nodePOP };
  }

  async getNodeIp(
    infoUrl: string,
    options?: CallOptions,
  ): Promise<NodeAddress> {
    const { ip } = await this.transport.request(
      infoUrl,
      'info.getNodeIP',
      undefined,
      GetNodeIpResultSchema,
      options,
    );
    return parseHostPort(ip, 'info.getNodeIP');
  }

  async listPeers(
    infoUrl: string,
    nodeIds: NodeId[] = [],
    options?: CallOptions,
  ): Promise<NodePeer[]> {
    const { peers } = await this.transport.request(
      infoUrl,
      'info.peers',
      { nodeIDs: nodeIds },
      PeersResultSchema,
      options,
    );
    const parsed: NodePeer[] = [];
    for (const peer of peers ?? []) {
      try {
        const { ip, port } = parseHostPort(peer.publicIP, 'info.peers');
        parsed.push({
          nodeId: peer.nodeID,
          publicIp: ip,
          stakingPort: port,
          version: peer.version,
        });
      } catch (error) {
        this.logger.warn(
          {
            nodeId: peer.nodeID,
            publicIP: peer.publicIP,
            error: errorToString(error),
          },
          'Skipping peer with invalid address',
        );
      }
    }
    return parsed;
  }

  async getNodeVersion(infoUrl: string): Promise<NodeVersions> {
    const result = await this.transport.request(
      infoUrl,
      'info.getNodeVersion',
      undefined,
      GetNodeVersionResultSchema,
    );
    return {
      avalanchegoVersion: result.version,
      databaseVersion: result.databaseVersion,
      gitCommit: result.gitCommit,
      vmVersions: result.vmVersions,
      rpcProtocolVersion: result.rpcProtocolVersion,
    };
  }

  async getNetworkName(infoUrl: string): Promise<string> {
    const { networkName } = await this.transport.request(
      infoUrl,
      'info.getNetworkName',
      undefined,
      GetNetworkNameResultSchema,
    );
    return networkName;
  }

  async getNodeUptime(infoUrl: string): Promise<NodeUptime> {
    return this.transport.request(
      infoUrl,
      'info.uptime',
      undefined,
      UptimeResultSchema,
    );
  }

  async isBootstrapped(infoUrl: string, chain: string): Promise<boolean> {
    const { isBootstrapped } = await this.transport.request(
      infoUrl,
      'info.isBootstrapped',
      { chain },
      IsBootstrappedResultSchema,
    );
    return isBootstrapped;
  }

  async getValidatorSignature(
    rpcUrl: string,
    messageId: Cb58Id,
    options?: CallOptions,
  ): Promise<HexString> {
    const signature = await this.transport.request(
      rpcUrl,
      'warp_getSignature',
      [messageId],
      WarpSignatureResultSchema,
      options,
    );
    const length = dataLength(signature);
    if (length !== WARP_SIGNATURE_LENGTH) {
      throw new MalformedResponseError(
        'warp_getSignature',
        `expected a ${WARP_SIGNATURE_LENGTH} byte signature, got ${length} bytes`,
      );
    }
    return signature.toLowerCase();
  }
}
