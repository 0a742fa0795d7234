import { expect } from 'chai';
import sinon from 'sinon';

import { OneShotSignal } from '../lib/channels';
import { DeviceError } from '../lib/errors';
import { FlowControlledInjector } from '../lib/injector';
import { rejectionOf, recordingLogger } from './test_utils';

function blocks(count: number, linesPerBlock: number): Uint32Array[] {
  return Array.from({ length: count }, (_, index) => Uint32Array.from(
    { length: linesPerBlock },
    (__, line) => index * linesPerBlock + line,
  ));
}

function stubClient() {
  return {
    putTable: sinon.stub().resolves(),
    getNumber: sinon.stub().resolves(0),
  };
}

describe('FlowControlledInjector', () => {
  it('uploads a single block in single mode without polling', async () => {
    const client = stubClient();
    const firstBlockReady = new OneShotSignal();
    const content = blocks(1, 16);
    const injector = new FlowControlledInjector(client, {
      table: 'pgen1.table',
      linesPerBlock: 16,
      maxBlocksQueued: 2,
      firstBlockReady,
    });

    const stats = await injector.run(1, async (index) => content[index]);

    expect(client.putTable.callCount).to.equal(1);
    const [path, sent, mode] = client.putTable.firstCall.args;
    expect(String(path)).to.equal('PGEN1.TABLE');
    expect(sent).to.equal(content[0]);
    expect(mode).to.equal('single');
    expect(client.getNumber.called).to.equal(false);
    expect(stats.blocks).to.equal(1);
    expect(stats.polls).to.equal(0);
    expect(firstBlockReady.fired).to.equal(true);
  });

  it('streams first/continue/last and polls after every block but the last', async () => {
    const client = stubClient();
    const content = blocks(3, 4);
    const injector = new FlowControlledInjector(client, {
      table: 'SEQ1.TABLE',
      linesPerBlock: 4,
      maxBlocksQueued: 7,
      sleep: sinon.stub().resolves(),
    });

    const stats = await injector.run(3, async (index) => content[index]);

    expect(client.putTable.getCalls().map((call) => call.args[2])).to.deep.equal([
      'streaming-first', 'streaming-continue', 'streaming-last',
    ]);
    expect(client.putTable.getCalls().map((call) => call.args[1])).to.deep.equal(content);
    expect(client.getNumber.callCount).to.equal(2);
    expect(String(client.getNumber.firstCall.args[0])).to.equal('SEQ1.TABLE.QUEUED_LINES');
    expect(stats.polls).to.equal(2);
  });

  it('waits while more than maxBlocksQueued blocks of lines are queued', async () => {
    const client = stubClient();
    client.getNumber.onCall(0).resolves(12);
    client.getNumber.onCall(1).resolves(9);
    client.getNumber.onCall(2).resolves(8);
    const sleep = sinon.stub().resolves();
    const injector = new FlowControlledInjector(client, {
      table: 'PGEN1.TABLE',
      linesPerBlock: 4,
      maxBlocksQueued: 2,
      pollIntervalMs: 5,
      sleep,
    });

    const stats = await injector.run(2, async () => new Uint32Array(4));

    expect(stats.polls).to.equal(3);
    expect(sleep.callCount).to.equal(2);
    expect(sleep.firstCall.args[0]).to.equal(5);
    expect(client.putTable.callCount).to.equal(2);
  });

  it('aborts on the first write the device refuses', async () => {
    const client = stubClient();
    client.putTable.onSecondCall().rejects(new DeviceError('Error putting PGEN1.TABLE: Table full'));
    const take = sinon.stub().resolves(new Uint32Array(2));
    const injector = new FlowControlledInjector(client, {
      table: 'PGEN1.TABLE',
      linesPerBlock: 2,
      maxBlocksQueued: 2,
    });

    const error = await rejectionOf(injector.run(4, take));

    expect(error).to.be.instanceOf(DeviceError);
    expect(take.callCount).to.equal(2);
    expect(client.putTable.callCount).to.equal(2);
  });

  it('does not signal readiness when the first upload fails', async () => {
    const client = stubClient();
    client.putTable.rejects(new DeviceError('Error putting PGEN1.TABLE: No such field'));
    const firstBlockReady = new OneShotSignal();
    const injector = new FlowControlledInjector(client, {
      table: 'PGEN1.TABLE',
      linesPerBlock: 2,
      maxBlocksQueued: 2,
      firstBlockReady,
    });

    await rejectionOf(injector.run(1, async () => new Uint32Array(2)));

    expect(firstBlockReady.fired).to.equal(false);
  });

  it('logs per-block timing with its tag', async () => {
    const logger = recordingLogger();
    const injector = new FlowControlledInjector(stubClient(), {
      table: 'SEQ1.TABLE',
      linesPerBlock: 1,
      maxBlocksQueued: 1,
      logger,
      tag: 'seq',
    });

    await injector.run(1, async () => new Uint32Array(4));

    expect(logger.lines).to.have.length(1);
    expect(logger.lines[0]).to.match(/^seq 0: single time waiting \d+\.\d{3} time sending \d+\.\d{3}$/);
  });
});
