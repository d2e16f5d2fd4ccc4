import { expect } from 'chai';

import { InvalidRpcUrlError } from '../errors.js';

import { formatRpcEndpoint, parseRpcEndpoint, peerRpcUrl } from './endpoint.js';

const CHAIN_ID = 'J3HwYPfUHaErNVokB45N3v5vr9HzGA33KeLGc1BsuFMwNZzgr';

describe('RPC endpoints', () => {
  describe('parseRpcEndpoint', () => {
    it('should keep every explicit part', () => {
      expect(
        parseRpcEndpoint('https://node.test:8443/ext/bc/C/rpc', CHAIN_ID),
      ).to.deep.equal({
        scheme: 'https',
        host: 'node.test',
        port: 8443,
        path: '/ext/bc/C/rpc',
      });
    });

    it('should default the scheme, port and path', () => {
      expect(parseRpcEndpoint('127.0.0.1', CHAIN_ID)).to.deep.equal({
        scheme: 'http',
        host: '127.0.0.1',
        port: 9650,
        path: `/ext/bc/${CHAIN_ID}/rpc`,
      });
      expect(parseRpcEndpoint('https://node.test', CHAIN_ID).port).to.equal(
        443,
      );
    });

    it('should strip brackets from IPv6 hosts', () => {
      const endpoint = parseRpcEndpoint('http://[::1]:9650/rpc', CHAIN_ID);
      expect(endpoint.host).to.equal('::1');
      expect(formatRpcEndpoint(endpoint)).to.equal('http://[::1]:9650/rpc');
    });

    it('should reject unusable URLs', () => {
      expect(() => parseRpcEndpoint('', CHAIN_ID)).to.throw(
        InvalidRpcUrlError,
        "Invalid RPC URL '': empty URL",
      );
      expect(() => parseRpcEndpoint('ws://node.test/rpc', CHAIN_ID)).to.throw(
        InvalidRpcUrlError,
        "unsupported scheme 'ws'",
      );
      expect(() => parseRpcEndpoint('http://node.test:99999', CHAIN_ID)).to.throw(
        InvalidRpcUrlError,
      );
    });
  });

  describe('peerRpcUrl', () => {
    it('should target the port below the staking port', () => {
      const endpoint = parseRpcEndpoint(
        `https://node.test/ext/bc/${CHAIN_ID}/rpc`,
        CHAIN_ID,
      );
      expect(
        peerRpcUrl(endpoint, {
          nodeId: 'NodeID-A',
          publicIp: '203.0.113.9',
          stakingPort: 9651,
        }),
      ).to.equal(`https://203.0.113.9:9650/ext/bc/${CHAIN_ID}/rpc`);
    });
  });
});
