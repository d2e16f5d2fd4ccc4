import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

import {
  errorToString,
  rootLogger,
  safelyAccessEnvVar,
  toEnvVarSegment,
  tryParseJsonOrYaml,
} from '@subnet-warp/utils';

import { InvalidConfigError, NotFoundError } from '../errors.js';

import {
  NetworkConfig,
  SubnetWarpConfig,
  SubnetWarpConfigSchema,
} from './schema.js';

export const CONFIG_PATH_ENV_VAR = 'SUBNET_WARP_CONFIG';

const logger = rootLogger.child({ module: 'config' });

export function defaultConfigPath(): string {
  return path.resolve(
    path.dirname(fileURLToPath(import.meta.url)),
    '../../conf/default.yaml',
  );
}

export function resolveConfigPath(configPath?: string): string {
  return (
    configPath ??
    safelyAccessEnvVar(CONFIG_PATH_ENV_VAR) ??
    defaultConfigPath()
  );
}

export function readConfig(configPath?: string): SubnetWarpConfig {
  const filepath = resolveConfigPath(configPath);
  if (!fs.existsSync(filepath)) {
    throw new NotFoundError({ type: 'configuration' }, 'file', filepath);
  }
  logger.debug({ filepath }, 'Reading configuration');

  const parsed = tryParseJsonOrYaml(fs.readFileSync(filepath, 'utf8'));
  if (!parsed.success) {
    throw new InvalidConfigError(filepath, parsed.error);
  }
  const config = SubnetWarpConfigSchema.safeParse(parsed.data);
  if (!config.success) {
    throw new InvalidConfigError(
      filepath,
      errorToString(config.error.message, 1000),
      config.error,
    );
  }
  return config.data;
}

export function rpcUrlEnvVar(networkName: string, chainName: string): string {
  return `RPC_URL_${toEnvVarSegment(networkName)}_${toEnvVarSegment(chainName)}`;
}

// RPC_URL_<NETWORK>_<CHAIN> replaces the configured RPC URL of a blockchain
export function applyRpcUrlOverrides(network: NetworkConfig): NetworkConfig {
  return {
    ...network,
    subnets: network.subnets.map((subnet) => ({
      ...subnet,
      blockchains: subnet.blockchains.map((chain) => {
        const variable = rpcUrlEnvVar(network.name, chain.name);
        const override = safelyAccessEnvVar(variable);
        if (!override) return chain;
        logger.debug(
          { network: network.name, chain: chain.name, variable },
          'Overriding RPC URL from environment',
        );
        return { ...chain, rpcUrl: override };
      }),
    })),
  };
}

export function loadNetworkConfig(
  networkName: string,
  configPath?: string,
): NetworkConfig {
  const config = readConfig(configPath);
  const network = config.networks.find(({ name }) => name === networkName);
  if (!network) {
    throw new NotFoundError({ type: 'configuration' }, 'network', networkName);
  }
  return applyRpcUrlOverrides(network);
}
