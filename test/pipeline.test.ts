import { expect } from 'chai';
import sinon from 'sinon';

import { RunOptions, TestKind, defaultRunOptions } from '../lib/config';
import { DeviceError, VerificationError } from '../lib/errors';
import { PipelineHooks, runPgenTest, runSeqTest } from '../lib/pipeline';
import { RunningFakeDevice } from '../scripts/fake-device';
import { RecordingLogger, recordingLogger, rejectionOf, startTestDevice } from './test_utils';

/** Deterministic stand-in for Math.random. */
function seededRandom(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 16807) % 2147483647;
    return state / 2147483647;
  };
}

describe('table streaming pipeline against the fake device', () => {
  let device: RunningFakeDevice;
  let logs: RecordingLogger;
  let hooks: PipelineHooks;

  function optionsFor(kind: TestKind, overrides: Partial<RunOptions>): RunOptions {
    return {
      ...defaultRunOptions(kind, '127.0.0.1'),
      controlPort: device.controlServer.port,
      dataPort: device.captureServer.port,
      pollIntervalMs: 5,
      activePollMs: 5,
      ...overrides,
    };
  }

  beforeEach(async () => {
    device = await startTestDevice();
    logs = recordingLogger();
    hooks = { loggerFactory: () => logs, random: seededRandom(7) };
  });

  afterEach(async () => {
    sinon.restore();
    await device.shutdown();
  });

  it('checks a single PGEN block without polling the queue depth', async () => {
    const result = await runPgenTest(optionsFor('pgen', { linesPerBlock: 16 }), hooks);
    expect(result.checked).to.equal(16);
    expect(result.expected).to.equal(16);
    expect(result.blocks).to.equal(1);
    expect(result.polls).to.equal(0);
    expect(logs.lines).to.include('Pushing table 0 from 0 to 15');
    expect(logs.lines).to.include('Checked 16 lines of 16 expected');
  });

  it('streams several PGEN blocks with flow control', async () => {
    const result = await runPgenTest(optionsFor('pgen', {
      linesPerBlock: 16,
      nblocks: 6,
      startNumber: 1000,
    }), hooks);
    expect(result.checked).to.equal(96);
    expect(result.blocks).to.equal(6);
    expect(result.polls).to.be.at.least(5);
    expect(logs.lines).to.include('Pushing table 5 from 1080 to 1095');
    expect(logs.errors).to.deep.equal([]);
  });

  it('checks every PGEN repeat of a single table', async () => {
    const result = await runPgenTest(optionsFor('pgen', { linesPerBlock: 8, repeats: 3 }), hooks);
    expect(result.checked).to.equal(24);
    expect(result.expected).to.equal(24);
  });

  it('checks SEQ output bits across producers and checkers', async () => {
    const result = await runSeqTest(optionsFor('seq', {
      linesPerBlock: 16,
      nblocks: 4,
      producerThreads: 2,
      checkerThreads: 2,
    }), hooks);
    expect(result.checked).to.equal(64);
    expect(result.blocks).to.equal(4);
    expect(logs.lines).to.include('Seq out bits offsets 16,17,18,19,20,21 from BITS0');
    expect(logs.errors).to.deep.equal([]);
  });

  it('checks every SEQ repeat against the one injected table', async () => {
    const result = await runSeqTest(optionsFor('seq', { linesPerBlock: 8, repeats: 3 }), hooks);
    expect(result.checked).to.equal(24);
  });

  it('aborts every stage when the device refuses a table write', async () => {
    const writeTable = sinon.stub(device.state, 'writeTable').callThrough();
    // call 0 clears the table while the layout is configured
    writeTable.onCall(1).returns({ ok: false, message: 'Table full' });

    const error = await rejectionOf(runPgenTest(optionsFor('pgen', { linesPerBlock: 16, nblocks: 3 }), hooks));
    expect(error).to.be.instanceOf(DeviceError);
    if (!(error instanceof DeviceError)) return;
    expect(error.message).to.equal('Error putting PGEN1.TABLE: Table full');
    expect(logs.errors).to.include('Run aborted by injector');
  });

  /** Route non-empty table writes through `alter` before the device stores them. */
  function alterTableWrites(alter: (words: number[]) => number[]) {
    const write = device.state.writeTable.bind(device.state);
    sinon.stub(device.state, 'writeTable').callsFake((name, suffix, words) => (
      words.length === 0 ? write(name, suffix, words) : write(name, suffix, alter(Array.from(words)))
    ));
  }

  it('fails a PGEN run that captures fewer lines than injected', async () => {
    alterTableWrites((words) => words.slice(0, -1));

    const error = await rejectionOf(runPgenTest(optionsFor('pgen', { linesPerBlock: 16 }), hooks));
    expect(error).to.be.instanceOf(VerificationError);
    if (!(error instanceof VerificationError)) return;
    expect(error.message).to.equal('Expected 16 lines, got 15');
    expect(logs.lines).to.include('Checked 15 lines of 16 expected');
  });

  it('fails a PGEN run on a wrong captured value', async () => {
    alterTableWrites((words) => words.map((word, i) => (i === 5 ? 999 : word)));

    const error = await rejectionOf(runPgenTest(optionsFor('pgen', { linesPerBlock: 16 }), hooks));
    expect(error).to.be.instanceOf(VerificationError);
    if (!(error instanceof VerificationError)) return;
    expect(error.message).to.equal('Entry 5 = 999, expected 5');
    expect(logs.lines.some((line) => /^Checked [0-5] lines of 16 expected$/.test(line))).to.equal(true);
    expect(logs.errors).to.include('Run aborted by checker');
  });

  it('fails a SEQ run whose capture comes up short', async () => {
    // drop the last table line (four words)
    alterTableWrites((words) => words.slice(0, -4));

    const error = await rejectionOf(runSeqTest(optionsFor('seq', { linesPerBlock: 16 }), hooks));
    expect(error).to.be.instanceOf(VerificationError);
    expect(logs.lines).to.include('Checked 0 lines of 16 expected (15 captured)');
  });

  it('stays quiet when asked to', async () => {
    const result = await runPgenTest(optionsFor('pgen', { linesPerBlock: 4, quiet: true }), hooks);
    expect(result.checked).to.equal(4);
    expect(logs.lines).to.deep.equal([]);
  });
});
