import { use as chaiUse, expect } from 'chai';
import chaiAsPromised from 'chai-as-promised';
import { pino } from 'pino';
import sinon from 'sinon';

import { MalformedResponseError } from '../errors.js';
import { jsonRpcResult, stubJsonRpc } from '../test/jsonRpc.js';

import { JsonRpcRegistryClient, parseHostPort } from './JsonRpcRegistryClient.js';

chaiUse(chaiAsPromised);

const PLATFORM_URL = 'http://node.test:9650/ext/bc/P';
const INFO_URL = 'http://node.test:9650/ext/info';
const SUBNET_ID = '2bRCr6B4MiEfSjidDwxDpdCyviwnfUVqB2HGwhm947w9YYqb7r';

describe('JsonRpcRegistryClient', () => {
  let client: JsonRpcRegistryClient;

  beforeEach(() => {
    client = new JsonRpcRegistryClient({ logger: pino({ level: 'silent' }) });
  });

  afterEach(() => {
    sinon.restore();
  });

  it('should list Subnets', async () => {
    const requests = stubJsonRpc(() =>
      jsonRpcResult({
        subnets: [
          { id: SUBNET_ID, controlKeys: ['P-local1abc'], threshold: '1' },
        ],
      }),
    );

    const subnets = await client.listSubnets(PLATFORM_URL);

    expect(subnets).to.deep.equal([
      { id: SUBNET_ID, controlKeys: ['P-local1abc'], threshold: 1 },
    ]);
    expect(requests).to.deep.equal([
      { url: PLATFORM_URL, method: 'platform.getSubnets', params: {} },
    ]);
  });

  it('should list blockchains without local fields', async () => {
    stubJsonRpc(() =>
      jsonRpcResult({
        blockchains: [
          {
            id: 'chain-1',
            name: 'dexalot',
            subnetID: SUBNET_ID,
            vmID: 'vm-1',
          },
        ],
      }),
    );

    expect(await client.listBlockchains(PLATFORM_URL)).to.deep.equal([
      {
        id: 'chain-1',
        name: 'dexalot',
        subnetId: SUBNET_ID,
        vmId: 'vm-1',
        vmType: '',
        rpcUrl: '',
      },
    ]);
  });

  it('should list current validators of a Subnet', async () => {
    const requests = stubJsonRpc(() =>
      jsonRpcResult({
        validators: [
          {
            txID: 'tx-1',
            nodeID: 'NodeID-A',
            startTime: '1700000000',
            endTime: '1800000000',
            weight: '20',
            connected: true,
            uptime: '99.5',
            delegators: null,
          },
        ],
      }),
    );

    const validators = await client.listValidators(PLATFORM_URL, SUBNET_ID);

    expect(requests[0].method).to.equal('platform.getCurrentValidators');
    expect(requests[0].params).to.deep.equal({ subnetID: SUBNET_ID });
    expect(validators).to.have.length(1);
    expect(validators[0]).to.include({
      txId: 'tx-1',
      nodeId: 'NodeID-A',
      subnetId: SUBNET_ID,
      startTime: 1700000000,
      endTime: 1800000000,
      weight: 20n,
      connected: true,
      uptime: 99.5,
    });
    expect(validators[0].delegators).to.be.undefined;
  });

  it('should default connection fields of pending validators', async () => {
    const requests = stubJsonRpc(() =>
      jsonRpcResult({
        validators: [
          {
            txID: 'tx-2',
            nodeID: 'NodeID-B',
            startTime: '1',
            endTime: '2',
            stakeAmount: '2000000000000',
          },
        ],
      }),
    );

    const [pending] = await client.listPendingValidators(
      PLATFORM_URL,
      SUBNET_ID,
    );

    expect(requests[0].method).to.equal('platform.getPendingValidators');
    expect(pending.connected).to.be.false;
    expect(pending.uptime).to.equal(0);
    expect(pending.stakeAmount).to.equal(2000000000000n);
  });

  it('should get the node identity and address', async () => {
    stubJsonRpc(({ method }) =>
      method === 'info.getNodeID'
        ? jsonRpcResult({
            nodeID: 'NodeID-A',
            nodePOP: { publicKey: '0x01', proofOfPossession: '0x02' },
          })
        : jsonRpcResult({ ip: '10.0.0.1:9651' }),
    );

    expect(await client.getNodeId(INFO_URL)).to.deep.equal({
      nodeId: 'NodeID-A',
      signer: { publicKey: '0x01', proofOfPossession: '0x02' },
    });
    expect(await client.getNodeIp(INFO_URL)).to.deep.equal({
      ip: '10.0.0.1',
      port: 9651,
    });
  });

  it('should list peers filtered by node ID', async () => {
    const requests = stubJsonRpc(() =>
      jsonRpcResult({
        numPeers: '1',
        peers: [
          {
            ip: '192.168.1.7:9651',
            publicIP: '203.0.113.7:9651',
            nodeID: 'NodeID-B',
            version: 'avalanche/1.10.0',
          },
        ],
      }),
    );

    const peers = await client.listPeers(INFO_URL, ['NodeID-B']);

    expect(requests[0].params).to.deep.equal({ nodeIDs: ['NodeID-B'] });
    expect(peers).to.deep.equal([
      {
        nodeId: 'NodeID-B',
        publicIp: '203.0.113.7',
        stakingPort: 9651,
        version: 'avalanche/1.10.0',
      },
    ]);
  });

  it('should skip peers with an unusable address', async () => {
    stubJsonRpc(() =>
      jsonRpcResult({
        peers: [
          {
            ip: '10.0.0.2:9651',
            publicIP: '10.0.0.2:9651',
            nodeID: 'NodeID-B',
          },
          { ip: '', publicIP: '', nodeID: 'NodeID-C' },
        ],
      }),
    );

    const peers = await client.listPeers(INFO_URL, ['NodeID-B', 'NodeID-C']);

    expect(peers).to.deep.equal([
      {
        nodeId: 'NodeID-B',
        publicIp: '10.0.0.2',
        stakingPort: 9651,
        version: undefined,
      },
    ]);
  });

  it('should treat a null peer list as empty', async () => {
    const requests = stubJsonRpc(() => jsonRpcResult({ peers: null }));

    expect(await client.listPeers(INFO_URL)).to.deep.equal([]);
    expect(requests[0].params).to.deep.equal({ nodeIDs: [] });
  });

  it('should read node version, network name, uptime and bootstrap state', async () => {
    const requests = stubJsonRpc(({ method }) => {
      switch (method) {
        case 'info.getNodeVersion':
          return jsonRpcResult({
            version: 'avalanche/1.10.0',
            databaseVersion: 'v1.4.5',
            gitCommit: 'abc123',
            vmVersions: { platform: 'v1.10.0' },
            rpcProtocolVersion: 26,
          });
        case 'info.getNetworkName':
          return jsonRpcResult({ networkName: 'fuji' });
        case 'info.uptime':
          return jsonRpcResult({
            rewardingStakePercentage: '100.0',
            weightedAveragePercentage: '99.5',
          });
        default:
          return jsonRpcResult({ isBootstrapped: true });
      }
    });

    expect(await client.getNodeVersion(INFO_URL)).to.deep.equal({
      avalanchegoVersion: 'avalanche/1.10.0',
      databaseVersion: 'v1.4.5',
      gitCommit: 'abc123',
      vmVersions: { platform: 'v1.10.0' },
      rpcProtocolVersion: '26',
    });
    expect(await client.getNetworkName(INFO_URL)).to.equal('fuji');
    expect(await client.getNodeUptime(INFO_URL)).to.deep.equal({
      rewardingStakePercentage: 100,
      weightedAveragePercentage: 99.5,
    });
    expect(await client.isBootstrapped(INFO_URL, 'X')).to.be.true;
    expect(requests[3].params).to.deep.equal({ chain: 'X' });
  });

  describe('getValidatorSignature', () => {
    const RPC_URL = 'http://node.test:9650/ext/bc/chain-1/rpc';

    it('should return a 96 byte signature', async () => {
      const requests = stubJsonRpc(() =>
        jsonRpcResult('0x' + 'AB'.repeat(96)),
      );

      const signature = await client.getValidatorSignature(RPC_URL, 'msg-1');

      expect(signature).to.equal('0x' + 'ab'.repeat(96));
      expect(requests).to.deep.equal([
        { url: RPC_URL, method: 'warp_getSignature', params: ['msg-1'] },
      ]);
    });

    it('should reject signatures of any other length', async () => {
      stubJsonRpc(() => jsonRpcResult('0x' + 'ab'.repeat(95)));

      await expect(
        client.getValidatorSignature(RPC_URL, 'msg-1'),
      ).to.be.rejectedWith(
        MalformedResponseError,
        'expected a 96 byte signature, got 95 bytes',
      );
    });
  });
});

describe('parseHostPort', () => {
  it('should split IPv4 and IPv6 addresses', () => {
    expect(parseHostPort('127.0.0.1:9651', 'test')).to.deep.equal({
      ip: '127.0.0.1',
      port: 9651,
    });
    expect(parseHostPort('[::1]:9651', 'test')).to.deep.equal({
      ip: '::1',
      port: 9651,
    });
  });

  it('should reject values without a valid port', () => {
    expect(() => parseHostPort('127.0.0.1', 'info.peers')).to.throw(
      MalformedResponseError,
      "invalid address '127.0.0.1'",
    );
    expect(() => parseHostPort('127.0.0.1:0', 'info.peers')).to.throw(
      MalformedResponseError,
    );
  });
});
