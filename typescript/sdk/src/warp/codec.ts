import {
  BytesLike,
  concat,
  dataLength,
  dataSlice,
  getBytes,
  hexlify,
  sha256,
  toBeHex,
  toNumber,
} from 'ethers';

import {
  Cb58Id,
  HexString,
  assert,
  cb58Decode,
  cb58Encode,
  rootLogger,
} from '@subnet-warp/utils';

import {
  PayloadIntegrityError,
  PayloadTooShortError,
  isSubnetWarpError,
} from '../errors.js';

import {
  AddressedPayload,
  WarpPayloadType,
  WarpUnsignedMessage,
} from './types.js';

const logger = rootLogger.child({ module: 'warp-codec' });

// [0..2] reserved, [2..6] network ID, [6..38] source chain ID, [38..] payload
const RESERVED_PREFIX_LENGTH = 2;
const NETWORK_ID_OFFSET = 2;
const SOURCE_CHAIN_ID_OFFSET = 6;
export const UNSIGNED_MESSAGE_HEADER_LENGTH = 38;

// [0..4] length, [4..10] reserved, [10..30] source address,
// [30..62] destination chain ID, [62..82] destination address, [82..] payload
const LENGTH_PREFIX_LENGTH = 4;
const ADDRESSED_RESERVED_LENGTH = 6;
const SOURCE_ADDRESS_OFFSET = 10;
const DESTINATION_CHAIN_ID_OFFSET = 30;
const DESTINATION_ADDRESS_OFFSET = 62;
const ADDRESSED_PAYLOAD_OFFSET = 82;
export const ADDRESSED_PAYLOAD_MIN_LENGTH = 88;

const ADDRESS_LENGTH = 20;
const ID_LENGTH = 32;

export function warpMessageId(bytes: BytesLike): Cb58Id {
  return cb58Encode(sha256(bytes));
}

export function decodeUnsignedMessage(bytes: BytesLike): WarpUnsignedMessage {
  const data = getBytes(bytes);
  if (data.length < UNSIGNED_MESSAGE_HEADER_LENGTH) {
    throw new PayloadTooShortError(
      'Warp unsigned message',
      UNSIGNED_MESSAGE_HEADER_LENGTH,
      data.length,
    );
  }

  const idHex = sha256(data);
  const sourceChainIdHex = dataSlice(
    data,
    SOURCE_CHAIN_ID_OFFSET,
    UNSIGNED_MESSAGE_HEADER_LENGTH,
  );

  return {
    id: cb58Encode(idHex),
    idHex,
    networkId: toNumber(
      dataSlice(data, NETWORK_ID_OFFSET, SOURCE_CHAIN_ID_OFFSET),
    ),
    sourceChainId: cb58Encode(sourceChainIdHex),
    sourceChainIdHex,
    payload: {
      type: WarpPayloadType.Unknown,
      bytes: dataSlice(data, UNSIGNED_MESSAGE_HEADER_LENGTH),
    },
    bytes: hexlify(data),
  };
}

export function encodeUnsignedMessage({
  networkId,
  sourceChainId,
  payload,
}: {
  networkId: number;
  sourceChainId: Cb58Id;
  payload: BytesLike;
}): HexString {
  const sourceChain = cb58Decode(sourceChainId);
  assert(
    sourceChain.length === ID_LENGTH,
    `Source chain ID must be ${ID_LENGTH} bytes`,
  );
  return concat([
    new Uint8Array(RESERVED_PREFIX_LENGTH),
    toBeHex(networkId, 4),
    sourceChain,
    payload,
  ]);
}

export function decodeAddressedPayload(bytes: BytesLike): AddressedPayload {
  const data = getBytes(bytes);
  if (data.length < ADDRESSED_PAYLOAD_MIN_LENGTH) {
    throw new PayloadTooShortError(
      'AddressedPayload',
      ADDRESSED_PAYLOAD_MIN_LENGTH,
      data.length,
    );
  }

  const declaredLength = toNumber(dataSlice(data, 0, LENGTH_PREFIX_LENGTH));
  if (declaredLength + LENGTH_PREFIX_LENGTH !== data.length) {
    throw new PayloadIntegrityError(
      'AddressedPayload',
      declaredLength,
      data.length,
    );
  }

  return {
    sourceAddress: dataSlice(
      data,
      SOURCE_ADDRESS_OFFSET,
      DESTINATION_CHAIN_ID_OFFSET,
    ),
    destinationChainId: cb58Encode(
      dataSlice(data, DESTINATION_CHAIN_ID_OFFSET, DESTINATION_ADDRESS_OFFSET),
    ),
    destinationAddress: dataSlice(
      data,
      DESTINATION_ADDRESS_OFFSET,
      ADDRESSED_PAYLOAD_OFFSET,
    ),
    payload: dataSlice(data, ADDRESSED_PAYLOAD_OFFSET),
  };
}

export function encodeAddressedPayload(
  addressedPayload: AddressedPayload,
): HexString {
  const destinationChain = cb58Decode(addressedPayload.destinationChainId);
  assert(
    dataLength(addressedPayload.sourceAddress) === ADDRESS_LENGTH,
    `Source address must be ${ADDRESS_LENGTH} bytes`,
  );
  assert(
    dataLength(addressedPayload.destinationAddress) === ADDRESS_LENGTH,
    `Destination address must be ${ADDRESS_LENGTH} bytes`,
  );
  assert(
    destinationChain.length === ID_LENGTH,
    `Destination chain ID must be ${ID_LENGTH} bytes`,
  );

  const body = concat([
    new Uint8Array(ADDRESSED_RESERVED_LENGTH),
    addressedPayload.sourceAddress,
    destinationChain,
    addressedPayload.destinationAddress,
    addressedPayload.payload,
  ]);
  return concat([toBeHex(dataLength(body), LENGTH_PREFIX_LENGTH), body]);
}

/**
 * Decode a Warp message emitted by Subnet-EVM, interpreting its payload as
 * an AddressedPayload where possible. A payload that does not decode is kept
 * as Unknown; only an invalid outer message throws.
 */
export function decodeSubnetEvmUnsignedMessage(
  bytes: BytesLike,
): WarpUnsignedMessage {
  const message = decodeUnsignedMessage(bytes);
  try {
    const addressedPayload = decodeAddressedPayload(message.payload.bytes);
    return {
      ...message,
      payload: {
        type: WarpPayloadType.AddressedPayload,
        bytes: message.payload.bytes,
        addressedPayload,
      },
    };
  } catch (error) {
    if (!isSubnetWarpError(error)) throw error;
    logger.debug(
      { messageId: message.id, error: error.message },
      'Payload is not an AddressedPayload, keeping it as Unknown',
    );
    return message;
  }
}
