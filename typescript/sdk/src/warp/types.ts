import type { Address, Cb58Id, HexString, NodeId } from '@subnet-warp/utils';

export enum WarpPayloadType {
  Unknown = 'Unknown',
  AddressedPayload = 'AddressedPayload',
}

/**
 * Point to point message between VMs, carried as the payload of a Warp
 * message emitted by Subnet-EVM.
 */
export interface AddressedPayload {
  sourceAddress: Address;
  destinationChainId: Cb58Id;
  destinationAddress: Address;
  payload: HexString;
}

// The wire format has no type tag, so a payload that fails every known
// decoder stays Unknown
export type WarpPayload =
  | { type: WarpPayloadType.Unknown; bytes: HexString }
  | {
      type: WarpPayloadType.AddressedPayload;
      bytes: HexString;
      addressedPayload: AddressedPayload;
    };

export interface WarpUnsignedMessage {
  // sha256 of `bytes`
  id: Cb58Id;
  idHex: HexString;
  networkId: number;
  sourceChainId: Cb58Id;
  sourceChainIdHex: HexString;
  payload: WarpPayload;
  bytes: HexString;
}

export interface SubnetEvmWarpMessageFields {
  originChainId: Cb58Id;
  originSenderAddress: Address;
  destinationChainId: Cb58Id;
  destinationAddress: Address;
  payload?: HexString;
}

export enum WarpMessageStatusType {
  Sent = 'Sent',
  Signed = 'Signed',
}

export type WarpMessageStatus =
  | { type: WarpMessageStatusType.Sent }
  | { type: WarpMessageStatusType.Signed; count: number };

export interface ValidatorSignature {
  nodeId: NodeId;
  signature: HexString;
}

// Minimal shape of an EVM log, compatible with ethers' `Log`
export interface WarpLogLike {
  data: string;
  topics: ReadonlyArray<string>;
}
