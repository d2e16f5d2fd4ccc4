import { z } from 'zod';

export const JsonRpcErrorSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});

export const JsonRpcEnvelopeSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: z.union([z.number(), z.string(), z.null()]),
  result: z.unknown().optional(),
  error: JsonRpcErrorSchema.optional(),
});

// Avalanche APIs encode most integers as decimal strings
const ZUint = z.coerce.number().int().nonnegative();
const ZAmount = z.coerce.bigint();

export const OutputOwnersSchema = z.object({
  locktime: ZUint,
  threshold: ZUint,
  addresses: z.array(z.string()),
});

export const SignerSchema = z.object({
  publicKey: z.string(),
  proofOfPossession: z.string(),
});

export const DelegatorSchema = z.object({
  txID: z.string(),
  nodeID: z.string(),
  startTime: ZUint,
  endTime: ZUint,
  stakeAmount: ZAmount,
  potentialReward: ZAmount.optional(),
  rewardOwner: OutputOwnersSchema.optional(),
});

export const ValidatorSchema = z.object({
  txID: z.string(),
  nodeID: z.string(),
  startTime: ZUint,
  endTime: ZUint,
  stakeAmount: ZAmount.optional(),
  weight: ZAmount.optional(),
  potentialReward: ZAmount.optional(),
  delegationFee: z.coerce.number().optional(),
  connected: z.boolean().default(false),
  uptime: z.coerce.number().default(0),
  validationRewardOwner: OutputOwnersSchema.optional(),
  delegatorCount: ZUint.optional(),
  delegatorWeight: ZAmount.optional(),
  delegators: z.array(DelegatorSchema).nullish(),
  delegationRewardOwner: OutputOwnersSchema.optional(),
  signer: SignerSchema.optional(),
});
export type ValidatorResult = z.infer<typeof ValidatorSchema>;

export const GetSubnetsResultSchema = z.object({
  subnets: z.array(
    z.object({
      id: z.string(),
      controlKeys: z.array(z.string()),
      threshold: ZUint,
    }),
  ),
});

export const GetBlockchainsResultSchema = z.object({
  blockchains: z.array(
    z.object({
      id: z.string(),
      name: z.string(),
      subnetID: z.string(),
      vmID: z.string(),
    }),
  ),
});

export const GetValidatorsResultSchema = z.object({
  validators: z.array(ValidatorSchema),
});

export const GetNodeIdResultSchema = z.object({
  nodeID: z.string(),
  nodePOP: SignerSchema.optional(),
});

export const GetNodeIpResultSchema = z.object({
  ip: z.string(),
});

export const PeerSchema = z.object({
  ip: z.string(),
  publicIP: z.string(),
  nodeID: z.string(),
  version: z.string().optional(),
  trackedSubnets: z.array(z.string()).nullish(),
});

export const PeersResultSchema = z.object({
  numPeers: ZUint.optional(),
  peers: z.array(PeerSchema).nullish(),
});

export const GetNodeVersionResultSchema = z.object({
  version: z.string(),
  databaseVersion: z.string(),
  gitCommit: z.string(),
  vmVersions: z.record(z.string()),
  rpcProtocolVersion: z.coerce.string().optional(),
});

export const GetNetworkNameResultSchema = z.object({
  networkName: z.string(),
});

export const UptimeResultSchema = z.object({
  rewardingStakePercentage: z.coerce.number(),
  weightedAveragePercentage: z.coerce.number(),
});

export const IsBootstrappedResultSchema = z.object({
  isBootstrapped: z.boolean(),
});

export const WarpSignatureResultSchema = z
  .string()
  .regex(/^0x([0-9a-fA-F]{2})*$/, 'expected a 0x-prefixed hex string');
