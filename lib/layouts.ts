import { ProtocolError, VerificationError } from './errors';
import type { PandaClient } from './pandaClient';

export interface PgenLayout {
  pgen: string;
  clock: string;
}

export interface SeqLayout {
  seq: string;
  clock: string;
  /** Index of the PCAP.BITS word carrying all six SEQ outputs. */
  bitsWord: number;
  /** Bit offset of OUTA..OUTF inside that word. */
  offsets: number[];
}

const SEQ_OUTPUTS = ['OUTA', 'OUTB', 'OUTC', 'OUTD', 'OUTE', 'OUTF'];

function requireInstance(client: PandaClient, prefix: string): string {
  const name = client.findFirstInstance(prefix);
  if (!name) throw new ProtocolError(`Device has no ${prefix} block`);
  return name;
}

/** PCAP captures on every rising edge of the clock while the generator runs. */
async function configureCapture(client: PandaClient, source: string, clock: string, enableDelay: number, trigDelay: number) {
  const pcap = client.field('PCAP');
  await pcap.child('ENABLE').put(`${source}.ACTIVE`);
  await pcap.child('ENABLE.DELAY').put(enableDelay);
  await pcap.child('TRIG').put(`${clock}.OUT`);
  await pcap.child('TRIG.DELAY').put(trigDelay);
  await pcap.child('TRIG_EDGE').put('Rising');
  await pcap.child('GATE').put('ONE');
  await pcap.child('GATE.DELAY').put(0);
  await pcap.child('SHIFT_SUM').put(0);
  await pcap.child('TS_TRIG.CAPTURE').put('No');
}

export async function configurePgenLayout(client: PandaClient): Promise<PgenLayout> {
  const pgenName = requireInstance(client, 'PGEN');
  const clockName = requireInstance(client, 'CLOCK');
  const pgen = client.field(pgenName);
  const clock = client.field(clockName);

  await pgen.child('ENABLE').put('ZERO');
  await pgen.child('OUT.UNITS').put('');
  await pgen.child('OUT.OFFSET').put(0);
  await pgen.child('OUT.SCALE').put(1);
  await pgen.child('ENABLE.DELAY').put(0);
  await pgen.child('TRIG.DELAY').put(0);
  await pgen.child('REPEATS').put(1);
  await pgen.child('TRIG').put(`${clockName}.OUT`);
  await client.putTable(`${pgenName}.TABLE`, []);

  await clock.child('ENABLE').put(`${pgenName}.ACTIVE`);
  await clock.child('ENABLE.DELAY').put(0);
  await clock.child('PERIOD.UNITS').put('s');
  await clock.child('WIDTH.UNITS').put('s');
  await clock.child('PERIOD').put(1);
  await clock.child('WIDTH').put(0);

  await configureCapture(client, pgenName, clockName, 10, 1);
  await pgen.child('OUT.CAPTURE').put('Value');
  return { pgen: pgenName, clock: clockName };
}

export async function configureSeqLayout(client: PandaClient): Promise<Omit<SeqLayout, 'bitsWord' | 'offsets'>> {
  const seqName = requireInstance(client, 'SEQ');
  const clockName = requireInstance(client, 'CLOCK');
  const seq = client.field(seqName);
  const clock = client.field(clockName);

  await seq.child('ENABLE').put('ZERO');
  await seq.child('REPEATS').put(1);
  await seq.child('PRESCALE').put(0);
  await seq.child('BITA').put(`${clockName}.OUT`);
  for (const input of ['BITB', 'BITC', 'POSA', 'POSB', 'POSC']) {
    await seq.child(input).put('ZERO');
  }
  await client.putTable(`${seqName}.TABLE`, []);

  await clock.child('ENABLE').put(`${seqName}.ACTIVE`);
  await clock.child('ENABLE.DELAY').put(0);
  await clock.child('PERIOD.UNITS').put('s');
  await clock.child('WIDTH.UNITS').put('s');
  await clock.child('WIDTH.RAW').put(1);

  await configureCapture(client, seqName, clockName, 1, 2);
  return { seq: seqName, clock: clockName };
}

/** Capture word index from a value such as `PCAP.BITS2`. */
export function parseCaptureWord(value: unknown): number {
  const match = typeof value === 'string' ? /(\d+)$/.exec(value) : null;
  if (!match) throw new ProtocolError(`Unexpected CAPTURE_WORD value ${JSON.stringify(value)}`);
  return Number.parseInt(match[1], 10);
}

/** Locate the SEQ output bits; they must all land in the same BITS word. */
export async function readSeqOffsets(client: PandaClient, seqName: string): Promise<Pick<SeqLayout, 'bitsWord' | 'offsets'>> {
  const seq = client.field(seqName);
  const offsets: number[] = [];
  for (const out of SEQ_OUTPUTS) {
    offsets.push(await client.getNumber(seq.child(`${out}.OFFSET`).path));
  }

  const bitsWord = parseCaptureWord(await seq.child('OUTA.CAPTURE_WORD').get());
  for (const out of SEQ_OUTPUTS.slice(1)) {
    const word = parseCaptureWord(await seq.child(`${out}.CAPTURE_WORD`).get());
    if (word !== bitsWord) {
      throw new VerificationError(`Can't capture all SEQ out bits in one word: ${out} is in BITS${word}, OUTA in BITS${bitsWord}`);
    }
  }
  return { bitsWord, offsets };
}
