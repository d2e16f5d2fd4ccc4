import type { Logger } from 'pino';

import { NodeId, rootLogger } from '@subnet-warp/utils';

import {
  DEFAULT_HTTP_PORT,
  DEFAULT_STAKING_PORT,
  INFO_API_PATH,
  NOT_A_VALIDATOR_ERROR_CODE,
} from '../consts/network.js';
import { RpcApplicationError } from '../errors.js';
import { JsonRpcRegistryClient } from '../rpc/JsonRpcRegistryClient.js';
import type {
  CallOptions,
  NodeUptime,
  NodeVersions,
  RemoteRegistryClient,
} from '../rpc/RemoteRegistryClient.js';
import type { BlsSigner } from '../topology/types.js';

export interface EndpointNodeOptions {
  httpHost: string;
  httpPort?: number;
  httpsEnabled?: boolean;
  client?: RemoteRegistryClient;
  logger?: Logger;
}

export const ZERO_UPTIME: NodeUptime = {
  rewardingStakePercentage: 0,
  weightedAveragePercentage: 0,
};

/**
 * A node reached through its HTTP API. Identity and info fields are empty
 * until filled in by `updateIdentity` and `updateInfo`.
 */
export class EndpointNode {
  public readonly httpHost: string;
  public readonly httpPort: number;
  public readonly httpsEnabled: boolean;

  public id?: NodeId;
  public signer?: BlsSigner;
  public publicIp = '';
  public stakingPort = DEFAULT_STAKING_PORT;
  public versions?: NodeVersions;
  public network = '';
  public uptime: NodeUptime = { ...ZERO_UPTIME };

  protected readonly client: RemoteRegistryClient;
  protected readonly logger: Logger;

  constructor(options: EndpointNodeOptions) {
    this.httpHost = options.httpHost;
    this.httpPort = options.httpPort ?? DEFAULT_HTTP_PORT;
    this.httpsEnabled = options.httpsEnabled ?? false;
    this.logger =
      options.logger ??
      rootLogger.child({ module: 'EndpointNode', node: this.httpEndpoint });
    this.client =
      options.client ?? new JsonRpcRegistryClient({ logger: this.logger });
  }

  get httpEndpoint(): string {
    const scheme = this.httpsEnabled ? 'https' : 'http';
    const host = this.httpHost.includes(':')
      ? `[${this.httpHost}]`
      : this.httpHost;
    return `${scheme}://${host}:${this.httpPort}`;
  }

  get infoEndpoint(): string {
    return `${this.httpEndpoint}${INFO_API_PATH}`;
  }

  // Node ID, BLS signer and public staking address
  async updateIdentity(options?: CallOptions): Promise<void> {
    const { nodeId, signer } = await this.client.getNodeId(
      this.infoEndpoint,
      options,
    );
    const { ip, port } = await this.client.getNodeIp(
      this.infoEndpoint,
      options,
    );
    this.id = nodeId;
    this.signer = signer;
    this.publicIp = ip;
    this.stakingPort = port;
  }

  async updateInfo(): Promise<void> {
    await this.updateIdentity();
    this.versions = await this.client.getNodeVersion(this.infoEndpoint);
    this.network = await this.client.getNetworkName(this.infoEndpoint);
    this.uptime = await this.fetchUptime();
  }

  async isChainBootstrapped(chain: string): Promise<boolean> {
    return this.client.isBootstrapped(this.infoEndpoint, chain);
  }

  protected async fetchUptime(): Promise<NodeUptime> {
    try {
      return await this.client.getNodeUptime(this.infoEndpoint);
    } catch (error) {
      if (
        error instanceof RpcApplicationError &&
        error.code === NOT_A_VALIDATOR_ERROR_CODE
      ) {
        this.logger.debug(
          { nodeId: this.id, rpcMessage: error.rpcMessage },
          'Node is not a validator, uptime set to zero',
        );
        return { ...ZERO_UPTIME };
      }
      throw error;
    }
  }
}
