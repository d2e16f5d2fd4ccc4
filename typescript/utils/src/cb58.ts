import {
  BytesLike,
  concat,
  dataSlice,
  decodeBase58,
  encodeBase58,
  getBytes,
  hexlify,
  sha256,
  toBeArray,
} from 'ethers';

import { HexString } from './types.js';

const CHECKSUM_LENGTH = 4;
export const NODE_ID_PREFIX = 'NodeID-';
export const NODE_ID_LENGTH = 20;

function checksum(bytes: BytesLike): Uint8Array {
  return getBytes(dataSlice(sha256(bytes), 32 - CHECKSUM_LENGTH));
}

function base58ToBytes(value: string): Uint8Array {
  // decodeBase58 yields a bigint, so leading zero bytes ('1' characters)
  // have to be restored by hand
  const leadingZeros = value.length - value.replace(/^1+/, '').length;
  const body = decodeBase58(value);
  return getBytes(
    concat([new Uint8Array(leadingZeros), body === 0n ? '0x' : toBeArray(body)]),
  );
}

/**
 * Encodes bytes as CB58: base58 of the bytes followed by the last
 * four bytes of their sha256 digest.
 */
export function cb58Encode(value: BytesLike): string {
  const bytes = getBytes(value);
  return encodeBase58(concat([bytes, checksum(bytes)]));
}

export function cb58Decode(value: string): Uint8Array {
  const decoded = base58ToBytes(value);
  if (decoded.length < CHECKSUM_LENGTH) {
    throw new Error(`CB58 value ${value} is too short`);
  }
  const body = decoded.slice(0, decoded.length - CHECKSUM_LENGTH);
  const expected = hexlify(checksum(body));
  const actual = hexlify(decoded.slice(decoded.length - CHECKSUM_LENGTH));
  if (expected !== actual) {
    throw new Error(`Invalid CB58 checksum for ${value}`);
  }
  return body;
}

export function cb58ToHex(value: string): HexString {
  return hexlify(cb58Decode(value));
}

// If the value is already hex (checked by 0x prefix), return it as is.
// Otherwise, treat it as CB58 and convert it to hex.
export function hexOrCb58ToHex(value: string): HexString {
  if (value.startsWith('0x')) return value.toLowerCase();
  return cb58ToHex(value);
}

export function nodeIdFromBytes(value: BytesLike): string {
  const bytes = getBytes(value);
  if (bytes.length !== NODE_ID_LENGTH) {
    throw new Error(
      `Node ID must be ${NODE_ID_LENGTH} bytes, got ${bytes.length}`,
    );
  }
  return `${NODE_ID_PREFIX}${cb58Encode(bytes)}`;
}

export function nodeIdToBytes(nodeId: string): Uint8Array {
  if (!nodeId.startsWith(NODE_ID_PREFIX)) {
    throw new Error(`Node ID ${nodeId} is missing the ${NODE_ID_PREFIX} prefix`);
  }
  const bytes = cb58Decode(nodeId.slice(NODE_ID_PREFIX.length));
  if (bytes.length !== NODE_ID_LENGTH) {
    throw new Error(`Node ID ${nodeId} does not decode to ${NODE_ID_LENGTH} bytes`);
  }
  return bytes;
}

export function isNodeId(value: string): boolean {
  try {
    nodeIdToBytes(value);
    return true;
  } catch {
    return false;
  }
}
