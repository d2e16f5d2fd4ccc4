import type { Logger } from 'pino';

import { Cb58Id, rootLogger } from '@subnet-warp/utils';

import { loadNetworkConfig } from '../config/loader.js';
import { NetworkConfig } from '../config/schema.js';
import {
  C_CHAIN_NAME,
  PRIMARY_NETWORK_ID,
  X_CHAIN_NAME,
} from '../consts/network.js';
import {
  InvalidRpcUrlError,
  NotFoundError,
  OperationNotAllowedError,
} from '../errors.js';
import { JsonRpcRegistryClient } from '../rpc/JsonRpcRegistryClient.js';
import type { RemoteRegistryClient } from '../rpc/RemoteRegistryClient.js';

import { Subnet } from './Subnet.js';
import {
  mergeBlockchains,
  mergeSubnets,
  replacePendingValidators,
  replaceValidators,
} from './reconcile.js';
import { Blockchain } from './types.js';

export interface NetworkOptions {
  client?: RemoteRegistryClient;
  logger?: Logger;
}

export interface LoadNetworkOptions extends NetworkOptions {
  configPath?: string;
}

function subnetFromConfig(config: NetworkConfig['subnets'][number]): Subnet {
  return new Subnet({
    id: config.id,
    subnetType: config.subnetType,
    controlKeys: config.controlKeys,
    threshold: config.threshold,
    blockchains: config.blockchains.map((chain) => ({
      ...chain,
      subnetId: config.id,
    })),
  });
}

/**
 * In-memory topology of a network, reconciled against the P-Chain registry.
 *
 * Refreshes await the registry first and then swap in the reconciled
 * collection in one step, so a failed refresh leaves the state untouched.
 * Concurrent refreshes must be serialized by the caller.
 */
export class Network {
  protected subnets: Subnet[];
  protected readonly client: RemoteRegistryClient;
  protected readonly logger: Logger;

  constructor(
    public readonly name: string,
    subnets: Subnet[],
    options: NetworkOptions = {},
  ) {
    this.subnets = [...subnets];
    this.logger =
      options.logger ??
      rootLogger.child({ module: 'Network', network: name });
    this.client =
      options.client ?? new JsonRpcRegistryClient({ logger: this.logger });
  }

  /**
   * Load a network from configuration. Fails unless the Primary Network
   * Subnet and its P-Chain are present.
   */
  static load(name: string, options: LoadNetworkOptions = {}): Network {
    const config = loadNetworkConfig(name, options.configPath);
    const network = new Network(
      config.name,
      config.subnets.map(subnetFromConfig),
      options,
    );
    network.getPChain();
    return network;
  }

  getSubnets(): readonly Subnet[] {
    return this.subnets;
  }

  getPrimarySubnet(): Subnet {
    return this.getSubnet(PRIMARY_NETWORK_ID);
  }

  getPChain(): Blockchain {
    return this.getPrimarySubnet().getBlockchain(PRIMARY_NETWORK_ID);
  }

  getCChain(): Blockchain {
    return this.getPrimarySubnet().getBlockchainByName(C_CHAIN_NAME);
  }

  getXChain(): Blockchain {
    return this.getPrimarySubnet().getBlockchainByName(X_CHAIN_NAME);
  }

  getSubnet(id: Cb58Id): Subnet {
    const subnet = this.subnets.find((s) => s.id === id);
    if (!subnet) {
      throw new NotFoundError(
        { type: 'network', name: this.name },
        'Subnet',
        id,
      );
    }
    return subnet;
  }

  getBlockchain(id: Cb58Id): Blockchain {
    for (const subnet of this.subnets) {
      const blockchain = subnet.blockchains.find((chain) => chain.id === id);
      if (blockchain) return blockchain;
    }
    throw new NotFoundError(
      { type: 'network', name: this.name },
      'blockchain',
      id,
    );
  }

  getBlockchainByName(name: string): Blockchain {
    for (const subnet of this.subnets) {
      const blockchain = subnet.blockchains.find((chain) => chain.name === name);
      if (blockchain) return blockchain;
    }
    throw new NotFoundError(
      { type: 'network', name: this.name },
      'blockchain',
      name,
    );
  }

  assertOperationAllowed(operation: string, networkBlacklist: string[]) {
    if (networkBlacklist.includes(this.name)) {
      throw new OperationNotAllowedError(operation, `network '${this.name}'`);
    }
  }

  protected platformUrl(): string {
    const { rpcUrl } = this.getPChain();
    if (!rpcUrl) {
      throw new InvalidRpcUrlError(
        rpcUrl,
        `P-Chain of network '${this.name}' has no RPC URL`,
      );
    }
    return rpcUrl;
  }

  async refreshSubnets(): Promise<void> {
    const remote = await this.client.listSubnets(this.platformUrl());
    this.subnets = mergeSubnets(this.subnets, remote);
    this.logger.debug(
      { listed: remote.length, known: this.subnets.length },
      'Refreshed Subnets',
    );
  }

  async refreshBlockchains(): Promise<void> {
    const remote = await this.client.listBlockchains(this.platformUrl());
    this.subnets = mergeBlockchains(this.subnets, remote);
    this.logger.debug({ listed: remote.length }, 'Refreshed blockchains');
  }

  async refreshValidators(subnetId: Cb58Id): Promise<void> {
    this.getSubnet(subnetId);
    const validators = await this.client.listValidators(
      this.platformUrl(),
      subnetId,
    );
    this.subnets = this.subnets.map((subnet) =>
      subnet.id === subnetId ? replaceValidators(subnet, validators) : subnet,
    );
    this.logger.debug(
      { subnetId, validators: validators.length },
      'Refreshed validators',
    );
  }

  async refreshPendingValidators(subnetId: Cb58Id): Promise<void> {
    this.getSubnet(subnetId);
    const validators = await this.client.listPendingValidators(
      this.platformUrl(),
      subnetId,
    );
    this.subnets = this.subnets.map((subnet) =>
      subnet.id === subnetId
        ? replacePendingValidators(subnet, validators)
        : subnet,
    );
    this.logger.debug(
      { subnetId, pendingValidators: validators.length },
      'Refreshed pending validators',
    );
  }
}
