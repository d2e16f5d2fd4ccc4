import { errorToString } from '@subnet-warp/utils';

import { DEFAULT_HTTPS_PORT, DEFAULT_HTTP_PORT } from '../consts/network.js';
import { InvalidRpcUrlError } from '../errors.js';
import type { NodePeer } from '../rpc/RemoteRegistryClient.js';

export type RpcScheme = 'http' | 'https';

export interface RpcEndpoint {
  scheme: RpcScheme;
  host: string;
  port: number;
  path: string;
}

export function defaultRpcPath(chainId: string): string {
  return `/ext/bc/${chainId}/rpc`;
}

function formatHost(host: string): string {
  return host.includes(':') ? `[${host}]` : host;
}

/**
 * Split a blockchain RPC URL into its parts. A missing scheme means http,
 * a missing port the scheme's default and a missing path the chain's
 * default RPC path.
 */
export function parseRpcEndpoint(rpcUrl: string, chainId: string): RpcEndpoint {
  if (!rpcUrl) throw new InvalidRpcUrlError(rpcUrl, 'empty URL');

  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(rpcUrl)
    ? rpcUrl
    : `http://${rpcUrl}`;
  let url: URL;
  try {
    url = new URL(withScheme);
  } catch (error) {
    throw new InvalidRpcUrlError(rpcUrl, errorToString(error), error);
  }

  let scheme: RpcScheme;
  if (url.protocol === 'http:') scheme = 'http';
  else if (url.protocol === 'https:') scheme = 'https';
  else {
    throw new InvalidRpcUrlError(
      rpcUrl,
      `unsupported scheme '${url.protocol.slice(0, -1)}'`,
    );
  }
  if (!url.hostname) throw new InvalidRpcUrlError(rpcUrl, 'missing host');

  return {
    scheme,
    host: url.hostname.replace(/^\[(.*)\]$/, '$1'),
    port: url.port
      ? Number(url.port)
      : scheme === 'https'
        ? DEFAULT_HTTPS_PORT
        : DEFAULT_HTTP_PORT,
    path: url.pathname === '/' ? defaultRpcPath(chainId) : url.pathname,
  };
}

export function formatRpcEndpoint({
  scheme,
  host,
  port,
  path,
}: RpcEndpoint): string {
  return `${scheme}://${formatHost(host)}:${port}${path}`;
}

// Peers serve their HTTP API one port below their advertised staking port
export function peerRpcUrl(endpoint: RpcEndpoint, peer: NodePeer): string {
  return formatRpcEndpoint({
    ...endpoint,
    host: peer.publicIp,
    port: peer.stakingPort - 1,
  });
}
