import { JsonRpcProvider } from 'ethers';

import { InvalidRpcUrlError, OperationNotAllowedError } from '../errors.js';

import { Blockchain } from './types.js';

export const EVM_VM_TYPES = ['EVM', 'Coreth', 'SubnetEVM'];

export function isEvmBlockchain(blockchain: Blockchain): boolean {
  return EVM_VM_TYPES.includes(blockchain.vmType);
}

export function getEthersProvider(blockchain: Blockchain): JsonRpcProvider {
  if (!isEvmBlockchain(blockchain)) {
    throw new OperationNotAllowedError(
      'ethers provider creation',
      `'${blockchain.vmType}' blockchain '${blockchain.name}'`,
    );
  }
  if (!blockchain.rpcUrl) {
    throw new InvalidRpcUrlError(
      blockchain.rpcUrl,
      `blockchain '${blockchain.name}' has no RPC URL`,
    );
  }
  return new JsonRpcProvider(blockchain.rpcUrl);
}
