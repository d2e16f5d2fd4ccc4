import { use as chaiUse, expect } from 'chai';
import chaiAsPromised from 'chai-as-promised';
import { pino } from 'pino';

import { RemoteUnavailableError, RpcApplicationError } from '../errors.js';
import { FakeRegistryClient } from '../test/FakeRegistryClient.js';

import { EndpointNode } from './EndpointNode.js';

chaiUse(chaiAsPromised);

const logger = pino({ level: 'silent' });
const NODE_ID = 'NodeID-7Xhw2mDxuDS44j42TCB6U5579esbSt3Lg';

describe('EndpointNode', () => {
  let client: FakeRegistryClient;

  beforeEach(() => {
    client = new FakeRegistryClient();
    client.nodeIdentity = { nodeId: NODE_ID };
    client.nodeAddress = { ip: '203.0.113.7', port: 9651 };
  });

  it('should build endpoints from host and port', () => {
    expect(
      new EndpointNode({ httpHost: '127.0.0.1', client, logger }).infoEndpoint,
    ).to.equal('http://127.0.0.1:9650/ext/info');
    expect(
      new EndpointNode({
        httpHost: 'api.node.test',
        httpPort: 443,
        httpsEnabled: true,
        client,
        logger,
      }).httpEndpoint,
    ).to.equal('https://api.node.test:443');
    expect(
      new EndpointNode({ httpHost: '::1', httpPort: 9650, client, logger })
        .httpEndpoint,
    ).to.equal('http://[::1]:9650');
  });

  it('should update its identity', async () => {
    const node = new EndpointNode({ httpHost: '127.0.0.1', client, logger });

    await node.updateIdentity();

    expect(node.id).to.equal(NODE_ID);
    expect(node.publicIp).to.equal('203.0.113.7');
    expect(node.stakingPort).to.equal(9651);
    expect(client.callsTo('getNodeId')[0].url).to.equal(
      'http://127.0.0.1:9650/ext/info',
    );
  });

  it('should propagate identity failures', async () => {
    client.nodeIdentity = undefined;
    const node = new EndpointNode({ httpHost: '127.0.0.1', client, logger });

    await expect(node.updateIdentity()).to.be.rejectedWith(
      RemoteUnavailableError,
    );
    expect(node.id).to.be.undefined;
  });

  it('should update versions, network and uptime', async () => {
    client.networkName = 'fuji';
    client.uptime = {
      rewardingStakePercentage: 99.5,
      weightedAveragePercentage: 98,
    };
    const node = new EndpointNode({ httpHost: '127.0.0.1', client, logger });

    await node.updateInfo();

    expect(node.network).to.equal('fuji');
    expect(node.versions?.avalanchegoVersion).to.equal('avalanche/1.10.0');
    expect(node.uptime).to.deep.equal({
      rewardingStakePercentage: 99.5,
      weightedAveragePercentage: 98,
    });
  });

  it('should report zero uptime for a node that is not a validator', async () => {
    client.uptime = new RpcApplicationError(
      'info.uptime',
      -32000,
      'node is not a validator',
    );
    const node = new EndpointNode({ httpHost: '127.0.0.1', client, logger });

    await node.updateInfo();

    expect(node.uptime).to.deep.equal({
      rewardingStakePercentage: 0,
      weightedAveragePercentage: 0,
    });
  });

  it('should propagate other uptime errors', async () => {
    client.uptime = new RpcApplicationError('info.uptime', -32603, 'internal');
    const node = new EndpointNode({ httpHost: '127.0.0.1', client, logger });

    await expect(node.updateInfo()).to.be.rejectedWith(
      RpcApplicationError,
      'info.uptime failed with code -32603: internal',
    );
  });

  it('should check whether a chain is bootstrapped', async () => {
    client.bootstrapped.add('P');
    const node = new EndpointNode({ httpHost: '127.0.0.1', client, logger });

    expect(await node.isChainBootstrapped('P')).to.be.true;
    expect(await node.isChainBootstrapped('X')).to.be.false;
  });
});
