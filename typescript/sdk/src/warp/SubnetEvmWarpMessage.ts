import { dataSlice } from 'ethers';

import { Address, Cb58Id, HexString, cb58Encode } from '@subnet-warp/utils';

import { MalformedResponseError } from '../errors.js';

import { decodeSubnetEvmUnsignedMessage } from './codec.js';
import {
  SubnetEvmWarpMessageFields,
  WarpLogLike,
  WarpPayloadType,
  WarpUnsignedMessage,
} from './types.js';

// topics: [event signature, destination chain ID, destination address, sender]
const SEND_WARP_MESSAGE_TOPIC_COUNT = 4;

/**
 * A Warp message as Subnet-EVM will interpret it on the destination chain.
 */
export class SubnetEvmWarpMessage implements SubnetEvmWarpMessageFields {
  public readonly originChainId: Cb58Id;
  public readonly originSenderAddress: Address;
  public readonly destinationChainId: Cb58Id;
  public readonly destinationAddress: Address;
  public readonly payload?: HexString;

  constructor(fields: SubnetEvmWarpMessageFields) {
    this.originChainId = fields.originChainId;
    this.originSenderAddress = fields.originSenderAddress;
    this.destinationChainId = fields.destinationChainId;
    this.destinationAddress = fields.destinationAddress;
    this.payload = fields.payload;
  }

  // Log data holds the unsigned message, ideally with an AddressedPayload
  static fromLog(log: WarpLogLike): {
    unsignedMessage: WarpUnsignedMessage;
    verifiedMessage: SubnetEvmWarpMessage;
  } {
    if (log.topics.length < SEND_WARP_MESSAGE_TOPIC_COUNT) {
      throw new MalformedResponseError(
        'SendWarpMessage',
        `expected ${SEND_WARP_MESSAGE_TOPIC_COUNT} topics, got ${log.topics.length}`,
      );
    }
    const unsignedMessage = decodeSubnetEvmUnsignedMessage(log.data);
    const verifiedMessage = new SubnetEvmWarpMessage({
      originChainId: unsignedMessage.sourceChainId,
      originSenderAddress: dataSlice(log.topics[3], 12),
      destinationChainId: cb58Encode(log.topics[1]),
      destinationAddress: dataSlice(log.topics[2], 12),
      payload:
        unsignedMessage.payload.type === WarpPayloadType.AddressedPayload
          ? unsignedMessage.payload.addressedPayload.payload
          : undefined,
    });
    return { unsignedMessage, verifiedMessage };
  }
}
