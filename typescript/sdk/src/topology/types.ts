import type { Cb58Id, HexString, NodeId } from '@subnet-warp/utils';

export enum SubnetType {
  PrimaryNetwork = 'PrimaryNetwork',
  Permissioned = 'Permissioned',
  Elastic = 'Elastic',
}

export interface Blockchain {
  id: Cb58Id;
  name: string;
  // Operator supplied, e.g. 'PlatformVM', 'Coreth', 'SubnetEVM'
  vmType: string;
  vmId: Cb58Id;
  // Lookup-only reference to the owning Subnet
  subnetId: Cb58Id;
  // Empty when unknown locally
  rpcUrl: string;
}

export interface OutputOwners {
  locktime: number;
  threshold: number;
  addresses: string[];
}

export interface BlsSigner {
  publicKey: HexString;
  proofOfPossession: HexString;
}

export interface Delegator {
  txId: Cb58Id;
  nodeId: NodeId;
  startTime: number;
  endTime: number;
  stakeAmount: bigint;
  potentialReward?: bigint;
  rewardOwner?: OutputOwners;
}

export interface Validator {
  txId: Cb58Id;
  nodeId: NodeId;
  subnetId: Cb58Id;
  startTime: number;
  endTime: number;
  stakeAmount?: bigint;
  weight?: bigint;
  potentialReward?: bigint;
  delegationFee?: number;
  // Currently reachable, as opposed to merely registered
  connected: boolean;
  uptime: number;
  validationRewardOwner?: OutputOwners;
  delegatorCount?: number;
  delegatorWeight?: bigint;
  delegators?: Delegator[];
  delegationRewardOwner?: OutputOwners;
  signer?: BlsSigner;
}

// A Subnet as listed by the registry, without its collections
export interface SubnetRecord {
  id: Cb58Id;
  controlKeys: string[];
  threshold: number;
}

export interface SubnetData extends SubnetRecord {
  subnetType: SubnetType;
  blockchains: Blockchain[];
  validators: Validator[];
  pendingValidators: Validator[];
}
