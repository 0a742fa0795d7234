import { expect } from 'chai';
import net from 'net';

import { ControlChannel, findTerminatorEnd } from '../lib/controlChannel';
import { ConnectionError } from '../lib/errors';
import {
  getFreePort,
  rejectionOf,
  sleep,
  startLineServer,
} from './test_utils';

type LineServer = Awaited<ReturnType<typeof startLineServer>>;

describe('ControlChannel', () => {
  let server: LineServer | null = null;
  let channel: ControlChannel | null = null;

  async function connect(respond: (line: string, socket: net.Socket) => void): Promise<ControlChannel> {
    server = await startLineServer(respond);
    channel = new ControlChannel({ host: '127.0.0.1', port: server.port });
    await channel.connect();
    return channel;
  }

  afterEach(async () => {
    await channel?.close();
    await server?.close();
    channel = null;
    server = null;
  });

  it('reads a one-line reply', async () => {
    const control = await connect((line, socket) => {
      if (line === 'PGEN1.OUT?') socket.write('OK =5\n');
    });
    const reply = await control.request('PGEN1.OUT?');
    expect(reply.toString()).to.equal('OK =5\n');
  });

  it('assembles a reply split across socket writes', async () => {
    const control = await connect((_line, socket) => {
      socket.write('OK =1');
      setTimeout(() => socket.write('2\n'), 5);
    });
    expect((await control.request('PGEN1.OUT?')).toString()).to.equal('OK =12\n');
  });

  it('reads a list up to its terminator', async () => {
    const control = await connect((_line, socket) => {
      socket.write('!1\n!2\n');
      setTimeout(() => socket.write('.\n'), 5);
    });
    expect((await control.request('PGEN1.TABLE?')).toString()).to.equal('!1\n!2\n.\n');
  });

  it('assembles a long list delivered in many small writes', async () => {
    const entries = Array.from({ length: 2000 }, (_, i) => `!${i}\n`);
    const control = await connect((_line, socket) => {
      const send = async () => {
        for (const entry of entries) {
          socket.write(entry);
          if (entry === '!1000\n') await sleep(5);
        }
        // terminator split over two writes
        socket.write('.');
        await sleep(5);
        socket.write('\n');
      };
      send().catch(() => socket.destroy());
    });
    const reply = (await control.request('PGEN1.TABLE?')).toString();
    expect(reply).to.equal(`${entries.join('')}.\n`);
  });

  it('keeps bytes after a reply for the next read', async () => {
    const control = await connect((line, socket) => {
      if (line === 'A?') socket.write('OK =1\nOK =2\n');
    });
    expect((await control.request('A?')).toString()).to.equal('OK =1\n');
    expect((await control.receiveLine()).toString()).to.equal('OK =2\n');
  });

  it('sends every line followed by a newline', async () => {
    const control = await connect(() => undefined);
    await control.send(['PGEN1.TABLE<B', 'AQAAAA==', '']);
    for (let attempt = 0; attempt < 50 && (server?.lines.length ?? 0) < 3; attempt += 1) {
      await sleep(2);
    }
    expect(server?.lines).to.deep.equal(['PGEN1.TABLE<B', 'AQAAAA==', '']);
  });

  it('rejects a pending read when the peer closes', async () => {
    const control = await connect((_line, socket) => socket.destroy());
    const error = await rejectionOf(control.request('PCAP.ACTIVE?'));
    expect(error).to.be.instanceOf(ConnectionError);
    expect(control.connected).to.equal(false);
  });

  it('fails to connect to a closed port with ConnectionError', async () => {
    const port = await getFreePort();
    const closed = new ControlChannel({ host: '127.0.0.1', port, connectTimeoutMs: 1000 });
    const error = await rejectionOf(closed.connect());
    expect(error).to.be.instanceOf(ConnectionError);
    if (!(error instanceof Error)) return;
    expect(error.message).to.include(`127.0.0.1:${port}`);
  });

  it('finds the list terminator at the start or after a newline', () => {
    expect(findTerminatorEnd(Buffer.from('.\n'))).to.equal(2);
    expect(findTerminatorEnd(Buffer.from('!a\n.\n'))).to.equal(5);
    expect(findTerminatorEnd(Buffer.from('!a\n!b.\n'))).to.equal(-1);
  });
});
