import { expect } from 'chai';

import { ProtocolError } from '../lib/errors';
import {
  WORDS_PER_LINE,
  bufferToWords,
  decodeTableLines,
  encodeTable,
  parseTableCommand,
  streamingMode,
  wordsToBuffer,
} from '../lib/tableEncoder';

function counting(length: number): Uint32Array {
  const words = new Uint32Array(length);
  for (let i = 0; i < length; i += 1) words[i] = (i * 2654435761) >>> 0;
  return words;
}

describe('tableEncoder', () => {
  it('frames an empty table as the open line and the blank terminator', () => {
    expect(encodeTable('SEQ1.TABLE', [])).to.deep.equal(['SEQ1.TABLE<B', '']);
  });

  it('serialises words little-endian', () => {
    expect(encodeTable('PGEN1.TABLE', [1])).to.deep.equal(['PGEN1.TABLE<B', 'AQAAAA==', '']);
    expect([...wordsToBuffer([0x01020304])]).to.deep.equal([4, 3, 2, 1]);
  });

  it('uses the suffix of each upload mode', () => {
    expect(encodeTable('T', [], 'streaming-first')[0]).to.equal('T<<B');
    expect(encodeTable('T', [], 'streaming-continue')[0]).to.equal('T<<B');
    expect(encodeTable('T', [], 'streaming-last')[0]).to.equal('T<<|B');
  });

  it('accepts suffixes as configuration', () => {
    const suffixes = {
      single: '<',
      'streaming-first': '<<',
      'streaming-continue': '<<+',
      'streaming-last': '<<|',
    };
    expect(encodeTable('T', [], 'streaming-continue', suffixes)[0]).to.equal('T<<+B');
  });

  for (const length of [0, 1, 190, 191, 192, WORDS_PER_LINE * 3 + 5]) {
    it(`round-trips ${length} words in ${Math.ceil(length / WORDS_PER_LINE)} lines`, () => {
      const content = counting(length);
      const lines = encodeTable('SEQ1.TABLE', content, 'single');
      const body = lines.slice(1, -1);
      expect(body).to.have.length(Math.ceil(length / WORDS_PER_LINE));
      for (const line of body) expect(line.length).to.be.at.most(1020);
      expect(lines[lines.length - 1]).to.equal('');
      expect(Array.from(decodeTableLines(body))).to.deep.equal(Array.from(content));
    });
  }

  it('fills a full line with exactly 1020 base64 characters', () => {
    const [, line] = encodeTable('T', counting(WORDS_PER_LINE));
    expect(line).to.have.length(1020);
  });

  it('keeps the top bit of 32-bit words', () => {
    const lines = encodeTable('T', [0xffffffff, 0x80000000]);
    expect(Array.from(decodeTableLines(lines.slice(1, -1)))).to.deep.equal([0xffffffff, 0x80000000]);
  });

  it('rejects data that is not a whole number of words', () => {
    expect(() => bufferToWords(Buffer.from([1, 2, 3]))).to.throw(ProtocolError);
    expect(() => decodeTableLines(['AQID'])).to.throw(ProtocolError);
  });

  it('picks single for one block and first/continue/last otherwise', () => {
    expect(streamingMode(0, 1)).to.equal('single');
    expect([0, 1, 2].map((i) => streamingMode(i, 3))).to.deep.equal([
      'streaming-first', 'streaming-continue', 'streaming-last',
    ]);
    expect([0, 1].map((i) => streamingMode(i, 2))).to.deep.equal(['streaming-first', 'streaming-last']);
  });

  it('parses table open lines', () => {
    expect(parseTableCommand('SEQ1.TABLE<<|B')).to.deep.equal({ path: 'SEQ1.TABLE', suffix: '<<|', binary: true });
    expect(parseTableCommand('PGEN1.TABLE<<B')).to.deep.equal({ path: 'PGEN1.TABLE', suffix: '<<', binary: true });
    expect(parseTableCommand('PGEN1.TABLE<')).to.deep.equal({ path: 'PGEN1.TABLE', suffix: '<', binary: false });
    expect(parseTableCommand('PCAP.ACTIVE?')).to.equal(null);
    expect(parseTableCommand('PGEN1.REPEATS=1')).to.equal(null);
  });
});
