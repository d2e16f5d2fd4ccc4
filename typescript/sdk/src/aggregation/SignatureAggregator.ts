import type { Logger } from 'pino';

import {
  NodeId,
  assert,
  collectUntil,
  errorToString,
  retryAsync,
  rootLogger,
} from '@subnet-warp/utils';

import {
  NotFoundError,
  PeerNotFoundError,
  UnknownSourceChainError,
} from '../errors.js';
import { EndpointNode } from '../nodes/EndpointNode.js';
import { JsonRpcRegistryClient } from '../rpc/JsonRpcRegistryClient.js';
import type {
  NodePeer,
  RemoteRegistryClient,
} from '../rpc/RemoteRegistryClient.js';
import { Subnet } from '../topology/Subnet.js';
import { Blockchain, Validator } from '../topology/types.js';
import { WarpMessage } from '../warp/WarpMessage.js';
import { ValidatorSignature } from '../warp/types.js';

import {
  RpcEndpoint,
  formatRpcEndpoint,
  parseRpcEndpoint,
  peerRpcUrl,
} from './endpoint.js';

export const DEFAULT_AGGREGATION_CONCURRENCY = 8;
export const DEFAULT_SIGNATURE_TIMEOUT_MS = 10_000;
export const DEFAULT_SIGNATURE_ATTEMPTS = 2;
export const DEFAULT_SIGNATURE_RETRY_MS = 250;
export const DEFAULT_PEER_DISCOVERY_TIMEOUT_MS = 10_000;

export interface SignatureAggregatorOptions {
  client?: RemoteRegistryClient;
  logger?: Logger;
  concurrency?: number;
  // Per signature request
  requestTimeoutMs?: number;
  // Per validator, including the first try
  attempts?: number;
  baseRetryMs?: number;
  peerDiscoveryTimeoutMs?: number;
}

interface AggregationContext {
  endpoint: RpcEndpoint;
  ownNodeId: NodeId;
  peers: Map<NodeId, NodePeer>;
}

/**
 * Collects validator signatures for Warp messages through the node serving
 * the source blockchain and its peers.
 */
export class SignatureAggregator {
  protected readonly client: RemoteRegistryClient;
  protected readonly logger: Logger;
  protected readonly concurrency: number;
  protected readonly requestTimeoutMs: number;
  protected readonly attempts: number;
  protected readonly baseRetryMs: number;
  protected readonly peerDiscoveryTimeoutMs: number;

  constructor(options: SignatureAggregatorOptions = {}) {
    this.logger =
      options.logger ?? rootLogger.child({ module: 'SignatureAggregator' });
    this.client =
      options.client ?? new JsonRpcRegistryClient({ logger: this.logger });
    this.concurrency = options.concurrency ?? DEFAULT_AGGREGATION_CONCURRENCY;
    this.requestTimeoutMs =
      options.requestTimeoutMs ?? DEFAULT_SIGNATURE_TIMEOUT_MS;
    this.attempts = options.attempts ?? DEFAULT_SIGNATURE_ATTEMPTS;
    this.baseRetryMs = options.baseRetryMs ?? DEFAULT_SIGNATURE_RETRY_MS;
    this.peerDiscoveryTimeoutMs =
      options.peerDiscoveryTimeoutMs ?? DEFAULT_PEER_DISCOVERY_TIMEOUT_MS;
    assert(this.concurrency > 0, 'concurrency must be greater than 0');
  }

  /**
   * Request signatures from the Subnet's validators, in their stored order,
   * until `quorum` of them answered. Validators that cannot be reached or
   * fail to sign are skipped, so fewer than `quorum` signatures is a normal
   * outcome.
   *
   * The collected signatures are added to `message`, ignoring validators it
   * already holds a signature from.
   *
   * @param quorum number of signatures to collect, all validators by default
   * @returns the signatures collected by this call, in validator order
   */
  async collectSignatures(
    subnet: Subnet,
    message: WarpMessage,
    quorum = subnet.validators.length,
  ): Promise<ValidatorSignature[]> {
    assert(quorum >= 0, `quorum must not be negative, got ${quorum}`);
    const context = await this.prepare(subnet, message);
    const logger = this.logger.child({
      messageId: message.id,
      subnetId: subnet.id,
    });

    const collected = await collectUntil(
      subnet.validators,
      (validator, _idx, signal) =>
        this.requestSignature(context, message, validator, signal, logger),
      { concurrency: this.concurrency, target: quorum },
    );
    const signatures = collected.map(({ value }) => value);

    let added = 0;
    for (const { nodeId, signature } of signatures) {
      if (message.addSignature(nodeId, signature)) added++;
    }
    logger.info(
      {
        collected: signatures.length,
        added,
        quorum,
        validators: subnet.validators.length,
        status: message.status,
      },
      'Collected Warp signatures',
    );
    return signatures;
  }

  // Failures here abort the whole collection
  protected async prepare(
    subnet: Subnet,
    message: WarpMessage,
  ): Promise<AggregationContext> {
    const { sourceChainId } = message.unsignedMessage;
    let blockchain: Blockchain;
    try {
      blockchain = subnet.getBlockchain(sourceChainId);
    } catch (error) {
      if (error instanceof NotFoundError) {
        throw new UnknownSourceChainError(subnet.id, sourceChainId, error);
      }
      throw error;
    }

    const endpoint = parseRpcEndpoint(blockchain.rpcUrl, blockchain.id);
    const node = new EndpointNode({
      httpHost: endpoint.host,
      httpPort: endpoint.port,
      httpsEnabled: endpoint.scheme === 'https',
      client: this.client,
      logger: this.logger,
    });
    const { nodeId: ownNodeId } = await this.client.getNodeId(
      node.infoEndpoint,
      { timeoutMs: this.requestTimeoutMs },
    );

    const peers = await this.discoverPeers(
      node,
      subnet.validators
        .map((validator) => validator.nodeId)
        .filter((nodeId) => nodeId !== ownNodeId),
    );

    return { endpoint, ownNodeId, peers };
  }

  protected async discoverPeers(
    node: EndpointNode,
    nodeIds: NodeId[],
  ): Promise<Map<NodeId, NodePeer>> {
    if (nodeIds.length === 0) return new Map();
    try {
      const peers = await this.client.listPeers(node.infoEndpoint, nodeIds, {
        timeoutMs: this.peerDiscoveryTimeoutMs,
      });
      return new Map(peers.map((peer) => [peer.nodeId, peer]));
    } catch (error) {
      // Only the endpoint's own signature remains reachable
      this.logger.warn(
        { node: node.httpEndpoint, error: errorToString(error) },
        'Peer discovery failed',
      );
      return new Map();
    }
  }

  protected signatureUrl(
    context: AggregationContext,
    nodeId: NodeId,
  ): string {
    if (nodeId === context.ownNodeId) {
      return formatRpcEndpoint(context.endpoint);
    }
    const peer = context.peers.get(nodeId);
    if (!peer) throw new PeerNotFoundError(nodeId);
    return peerRpcUrl(context.endpoint, peer);
  }

  // Resolves to undefined when the validator produced no signature
  protected async requestSignature(
    context: AggregationContext,
    message: WarpMessage,
    validator: Validator,
    signal: AbortSignal,
    logger: Logger,
  ): Promise<ValidatorSignature | undefined> {
    const { nodeId } = validator;
    try {
      const url = this.signatureUrl(context, nodeId);
      const signature = await retryAsync(
        () => {
          signal.throwIfAborted();
          return this.client.getValidatorSignature(url, message.id, {
            signal,
            timeoutMs: this.requestTimeoutMs,
          });
        },
        this.attempts,
        this.baseRetryMs,
        signal,
      );
      logger.debug({ nodeId, url }, 'Received validator signature');
      return { nodeId, signature };
    } catch (error) {
      if (signal.aborted) return undefined;
      logger.warn(
        { nodeId, error: errorToString(error) },
        'Skipping validator without signature',
      );
      return undefined;
    }
  }
}
