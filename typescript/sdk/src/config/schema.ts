import { z } from 'zod';

import { isHttpUrl } from '@subnet-warp/utils';

import { SubnetType } from '../topology/types.js';

export const BlockchainConfigSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  vmId: z.string().default(''),
  vmType: z.string().default(''),
  rpcUrl: z
    .string()
    .default('')
    .refine((url) => url === '' || isHttpUrl(url), {
      message: 'rpcUrl must be an http(s) URL',
    }),
});
export type BlockchainConfig = z.infer<typeof BlockchainConfigSchema>;

export const SubnetConfigSchema = z.object({
  id: z.string().min(1),
  subnetType: z.nativeEnum(SubnetType).optional(),
  controlKeys: z.array(z.string()).default([]),
  threshold: z.number().int().nonnegative().default(0),
  blockchains: z.array(BlockchainConfigSchema).default([]),
});
export type SubnetConfig = z.infer<typeof SubnetConfigSchema>;

export const NetworkConfigSchema = z.object({
  name: z.string().min(1),
  subnets: z.array(SubnetConfigSchema).default([]),
});
export type NetworkConfig = z.infer<typeof NetworkConfigSchema>;

export const SubnetWarpConfigSchema = z.object({
  networks: z.array(NetworkConfigSchema),
});
export type SubnetWarpConfig = z.infer<typeof SubnetWarpConfigSchema>;
