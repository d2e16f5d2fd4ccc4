// CB58 encoding of 32 zero bytes, shared by the Primary Network and its P-Chain
export const PRIMARY_NETWORK_ID = '11111111111111111111111111111111LpoYY';

export const P_CHAIN_NAME = 'P-Chain';
export const C_CHAIN_NAME = 'C-Chain';
export const X_CHAIN_NAME = 'X-Chain';

// Destination chain ID used by messages addressed to any chain
export const WARP_ANYCAST_ID =
  '2wkBET2rRgE8pahuaczxKbmv7ciehqsne57F9gtzf1PVcUJEQG';

export const DEFAULT_HTTP_PORT = 9650;
export const DEFAULT_HTTPS_PORT = 443;
export const DEFAULT_STAKING_PORT = 9651;
export const INFO_API_PATH = '/ext/info';

export const WARP_SIGNATURE_LENGTH = 96;

// Application error code returned by `info.uptime` on non-validator nodes
export const NOT_A_VALIDATOR_ERROR_CODE = -32000;
