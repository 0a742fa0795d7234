import { expect } from 'chai';

import { parseArgs } from '../scripts/fake-device';

describe('fake-device arguments', () => {
  it('uses the device defaults', () => {
    expect(parseArgs([])).to.deep.equal({
      host: '127.0.0.1',
      controlPort: 8888,
      dataPort: 8889,
      linesPerTick: 1024,
      tickMs: 10,
      logTraffic: false,
      quiet: false,
    });
  });

  it('reads value flags and switches', () => {
    const options = parseArgs(['--host', '0.0.0.0', '--data-port', '9001', '--tick-ms', '1', '--log-traffic']);
    expect(options.host).to.equal('0.0.0.0');
    expect(options.dataPort).to.equal(9001);
    expect(options.tickMs).to.equal(1);
    expect(options.logTraffic).to.equal(true);
    expect(options.quiet).to.equal(false);
  });

  it('rejects a value flag without a value', () => {
    expect(() => parseArgs(['--control-port', '--quiet'])).to.throw('Missing value for --control-port');
  });
});
