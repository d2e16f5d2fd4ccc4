import { expect } from 'chai';
import { id, zeroPadValue } from 'ethers';

import { cb58Encode } from '@subnet-warp/utils';

import { MalformedResponseError } from '../errors.js';

import { WarpMessage } from './WarpMessage.js';
import { encodeAddressedPayload, encodeUnsignedMessage } from './codec.js';
import { WarpMessageStatusType, WarpPayloadType } from './types.js';

const SOURCE_CHAIN_ID = cb58Encode('0x' + 'aa'.repeat(32));
const DESTINATION_CHAIN_HEX = '0x' + '11'.repeat(32);
const SENDER = '0x' + '44'.repeat(20);
const RECIPIENT = '0x' + '22'.repeat(20);
const SIGNATURE = '0x' + '99'.repeat(96);

const ADDRESSED_PAYLOAD = encodeAddressedPayload({
  sourceAddress: SENDER,
  destinationChainId: cb58Encode(DESTINATION_CHAIN_HEX),
  destinationAddress: RECIPIENT,
  payload: '0x' + '33'.repeat(8),
});

const MESSAGE_HEX = encodeUnsignedMessage({
  networkId: 12345,
  sourceChainId: SOURCE_CHAIN_ID,
  payload: ADDRESSED_PAYLOAD,
});

describe('WarpMessage', () => {
  it('should start in the Sent state', () => {
    const message = WarpMessage.fromBytes(MESSAGE_HEX);
    expect(message.status).to.deep.equal({ type: WarpMessageStatusType.Sent });
    expect(message.getSignatures()).to.deep.equal([]);
    expect(message.verifiedMessage).to.deep.equal({ type: 'Unknown' });
  });

  it('should count a validator signature once', () => {
    const message = WarpMessage.fromBytes(MESSAGE_HEX);

    expect(message.addSignature('NodeID-A', SIGNATURE)).to.be.true;
    expect(message.addSignature('NodeID-A', '0x' + '88'.repeat(96))).to.be
      .false;

    expect(message.status).to.deep.equal({
      type: WarpMessageStatusType.Signed,
      count: 1,
    });
    expect(message.getSignatures()).to.deep.equal([
      { nodeId: 'NodeID-A', signature: SIGNATURE },
    ]);
  });

  it('should keep signatures in insertion order', () => {
    const message = WarpMessage.fromBytes(MESSAGE_HEX);
    message.addSignature('NodeID-B', SIGNATURE);
    message.addSignature('NodeID-A', SIGNATURE);

    expect(message.getSignatures().map((s) => s.nodeId)).to.deep.equal([
      'NodeID-B',
      'NodeID-A',
    ]);
    expect(message.hasSignature('NodeID-A')).to.be.true;
    expect(message.status).to.deep.equal({
      type: WarpMessageStatusType.Signed,
      count: 2,
    });
  });

  describe('fromSubnetEvmLog', () => {
    const topics = [
      id('SendWarpMessage(bytes32,address,address,bytes)'),
      DESTINATION_CHAIN_HEX,
      zeroPadValue(RECIPIENT, 32),
      zeroPadValue(SENDER, 32),
    ];

    it('should build the Subnet-EVM view of the message', () => {
      const message = WarpMessage.fromSubnetEvmLog({
        data: MESSAGE_HEX,
        topics,
      });

      expect(message.unsignedMessage.payload.type).to.equal(
        WarpPayloadType.AddressedPayload,
      );
      expect(message.verifiedMessage.type).to.equal('SubnetEVM');
      if (message.verifiedMessage.type !== 'SubnetEVM') return;
      const verified = message.verifiedMessage.message;
      expect(verified.originChainId).to.equal(SOURCE_CHAIN_ID);
      expect(verified.originSenderAddress).to.equal(SENDER);
      expect(verified.destinationChainId).to.equal(
        cb58Encode(DESTINATION_CHAIN_HEX),
      );
      expect(verified.destinationAddress).to.equal(RECIPIENT);
      expect(verified.payload).to.equal('0x' + '33'.repeat(8));
    });

    it('should leave the payload unset when it does not decode', () => {
      const message = WarpMessage.fromSubnetEvmLog({
        data: encodeUnsignedMessage({
          networkId: 1,
          sourceChainId: SOURCE_CHAIN_ID,
          payload: '0x0102',
        }),
        topics,
      });

      expect(message.verifiedMessage.type).to.equal('SubnetEVM');
      if (message.verifiedMessage.type !== 'SubnetEVM') return;
      expect(message.verifiedMessage.message.payload).to.be.undefined;
    });

    it('should reject a log without the indexed topics', () => {
      expect(() =>
        WarpMessage.fromSubnetEvmLog({
          data: MESSAGE_HEX,
          topics: topics.slice(0, 2),
        }),
      ).to.throw(MalformedResponseError, 'expected 4 topics, got 2');
    });
  });
});
