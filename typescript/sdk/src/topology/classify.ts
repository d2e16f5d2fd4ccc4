import { Cb58Id } from '@subnet-warp/utils';

import { PRIMARY_NETWORK_ID } from '../consts/network.js';

import { SubnetType } from './types.js';

export function classifySubnet(threshold: number, id: Cb58Id): SubnetType {
  if (threshold > 0) return SubnetType.Permissioned;
  return id === PRIMARY_NETWORK_ID
    ? SubnetType.PrimaryNetwork
    : SubnetType.Elastic;
}
