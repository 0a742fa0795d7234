import { expect } from 'chai';
import sinon from 'sinon';
import proxyquire from 'proxyquire';

const proxyquireStrict = proxyquire.noCallThru().noPreserveCache();

function loadApp() {
  const runPgenTest = sinon.stub().resolves({ checked: 32768, elapsedMs: 2000 });
  const runSeqTest = sinon.stub().resolves({ checked: 16384, elapsedMs: 1000 });
  const fakeDeviceMain = sinon.stub().resolves(null);
  const app: typeof import('../app') = proxyquireStrict('../app.ts', {
    './lib/pipeline': { runPgenTest, runSeqTest },
    './scripts/fake-device': { main: fakeDeviceMain },
    'source-map-support': {
      install: sinon.stub(),
    },
  });
  return {
    app, runPgenTest, runSeqTest, fakeDeviceMain,
  };
}

describe('app command line', () => {
  let consoleLog: sinon.SinonStub;

  beforeEach(() => {
    consoleLog = sinon.stub(console, 'log');
  });

  afterEach(() => {
    sinon.restore();
  });

  it('parses pgen options and reports the result', async () => {
    const { app, runPgenTest, runSeqTest } = loadApp();
    await app.main(['pgen', '192.0.2.5', '--nblocks', '2', '--lines-per-block', '64']);

    expect(runSeqTest.called).to.equal(false);
    expect(runPgenTest.calledOnce).to.equal(true);
    const [options] = runPgenTest.firstCall.args;
    expect(options.host).to.equal('192.0.2.5');
    expect(options.nblocks).to.equal(2);
    expect(options.linesPerBlock).to.equal(64);
    expect(options.maxBlocksQueued).to.equal(2);
    expect(consoleLog.calledWith('[pgen]', 'Passed: 32768 lines in 2.000 s')).to.equal(true);
  });

  it('runs the SEQ test with its own defaults', async () => {
    const { app, runSeqTest } = loadApp();
    await app.main(['seq', '192.0.2.5', '--producer-threads', '2', '--nblocks', '4']);

    expect(runSeqTest.calledOnce).to.equal(true);
    const [options] = runSeqTest.firstCall.args;
    expect(options.producerThreads).to.equal(2);
    expect(options.maxBlocksQueued).to.equal(7);
  });

  it('rejects invalid test options before connecting', async () => {
    const { app, runPgenTest } = loadApp();
    let error: unknown = null;
    try {
      await app.main(['pgen', '192.0.2.5', '--nblocks', '2', '--repeats', '3']);
    } catch (caught) {
      error = caught;
    }
    expect(error).to.be.instanceOf(Error);
    if (!(error instanceof Error)) return;
    expect(error.message).to.equal('repeats and nblocks cannot be used together');
    expect(runPgenTest.called).to.equal(false);
  });

  it('prints usage for help and for no command', async () => {
    const { app } = loadApp();
    await app.main([]);
    await app.main(['pgen', '--help']);
    expect(consoleLog.withArgs('Usage: app.ts <command> [options]').callCount).to.equal(2);
  });

  it('prints usage and fails on an unknown command', async () => {
    const { app } = loadApp();
    let error: unknown = null;
    try {
      await app.main(['flash']);
    } catch (caught) {
      error = caught;
    }
    expect(error).to.be.instanceOf(Error);
    if (!(error instanceof Error)) return;
    expect(error.message).to.equal('Unknown command flash');
    expect(consoleLog.calledWith('Usage: app.ts <command> [options]')).to.equal(true);
  });

  it('forwards fake-device arguments', async () => {
    const { app, fakeDeviceMain } = loadApp();
    await app.main(['fake-device', '--control-port', '9000']);
    expect(fakeDeviceMain.calledOnceWithExactly(['--control-port', '9000'])).to.equal(true);
  });

  it('requires a host for watch', async () => {
    const { app } = loadApp();
    let error: unknown = null;
    try {
      await app.runWatch(['PCAP.ACTIVE'], {});
    } catch (caught) {
      error = caught;
    }
    expect(error).to.be.instanceOf(Error);
    if (!(error instanceof Error)) return;
    expect(error.message).to.equal('Usage: app.ts watch <host> <names>');
  });
});
