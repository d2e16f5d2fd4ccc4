import { PRIMARY_NETWORK_ID } from '../consts/network.js';
import { Subnet } from '../topology/Subnet.js';
import type { Blockchain, Validator } from '../topology/types.js';

export const TEST_SUBNET_ID =
  '2bRCr6B4MiEfSjidDwxDpdCyviwnfUVqB2HGwhm947w9YYqb7r';
export const TEST_CHAIN_ID =
  'J3HwYPfUHaErNVokB45N3v5vr9HzGA33KeLGc1BsuFMwNZzgr';
export const TEST_PLATFORM_URL = 'http://node.test:9650/ext/bc/P';

export function makeBlockchain(overrides: Partial<Blockchain> = {}): Blockchain {
  return {
    id: TEST_CHAIN_ID,
    name: 'TestChain',
    vmType: 'SubnetEVM',
    vmId: 'srEXiWaHuhNyGwPUi444Tu47ZEDwxTWrbQiuD7FmgSAQ6X7Dy',
    subnetId: TEST_SUBNET_ID,
    rpcUrl: `http://node.test:9650/ext/bc/${TEST_CHAIN_ID}/rpc`,
    ...overrides,
  };
}

export function makeValidator(
  nodeId: string,
  overrides: Partial<Validator> = {},
): Validator {
  return {
    txId: `tx-${nodeId}`,
    nodeId,
    subnetId: TEST_SUBNET_ID,
    startTime: 1_700_000_000,
    endTime: 1_800_000_000,
    weight: 20n,
    connected: true,
    uptime: 100,
    ...overrides,
  };
}

export function makePrimarySubnet(): Subnet {
  return new Subnet({
    id: PRIMARY_NETWORK_ID,
    controlKeys: [],
    threshold: 0,
    blockchains: [
      {
        id: PRIMARY_NETWORK_ID,
        name: 'P-Chain',
        vmType: 'PlatformVM',
        vmId: PRIMARY_NETWORK_ID,
        subnetId: PRIMARY_NETWORK_ID,
        rpcUrl: TEST_PLATFORM_URL,
      },
    ],
  });
}
