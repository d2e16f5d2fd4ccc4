import { BytesLike, hexlify } from 'ethers';

import { HexString, NodeId } from '@subnet-warp/utils';

import { SubnetEvmWarpMessage } from './SubnetEvmWarpMessage.js';
import { decodeUnsignedMessage } from './codec.js';
import {
  ValidatorSignature,
  WarpLogLike,
  WarpMessageStatus,
  WarpMessageStatusType,
  WarpUnsignedMessage,
} from './types.js';

export type VerifiedWarpMessage =
  | { type: 'Unknown' }
  | { type: 'SubnetEVM'; message: SubnetEvmWarpMessage };

/**
 * A Warp message together with the validator signatures collected for it.
 * Signatures are keyed by node ID and only ever appended.
 */
export class WarpMessage {
  protected readonly signatures = new Map<NodeId, HexString>();

  constructor(
    public readonly unsignedMessage: WarpUnsignedMessage,
    public readonly verifiedMessage: VerifiedWarpMessage = { type: 'Unknown' },
  ) {}

  static fromBytes(bytes: BytesLike): WarpMessage {
    return new WarpMessage(decodeUnsignedMessage(bytes));
  }

  static fromSubnetEvmLog(log: WarpLogLike): WarpMessage {
    const { unsignedMessage, verifiedMessage } =
      SubnetEvmWarpMessage.fromLog(log);
    return new WarpMessage(unsignedMessage, {
      type: 'SubnetEVM',
      message: verifiedMessage,
    });
  }

  get id() {
    return this.unsignedMessage.id;
  }

  get status(): WarpMessageStatus {
    const count = this.signatures.size;
    return count === 0
      ? { type: WarpMessageStatusType.Sent }
      : { type: WarpMessageStatusType.Signed, count };
  }

  /**
   * @returns false when the validator already has a signature on the message
   */
  addSignature(nodeId: NodeId, signature: BytesLike): boolean {
    if (this.signatures.has(nodeId)) return false;
    this.signatures.set(nodeId, hexlify(signature));
    return true;
  }

  hasSignature(nodeId: NodeId): boolean {
    return this.signatures.has(nodeId);
  }

  getSignatures(): ValidatorSignature[] {
    return [...this.signatures.entries()].map(([nodeId, signature]) => ({
      nodeId,
      signature,
    }));
  }
}
