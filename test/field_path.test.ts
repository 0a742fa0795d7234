import { expect } from 'chai';

import { FieldPath, resolvePath } from '../lib/fieldPath';

describe('FieldPath', () => {
  it('upper-cases and joins segments', () => {
    expect(FieldPath.of('seq1.table').toString()).to.equal('SEQ1.TABLE');
    expect(FieldPath.of('seq1').child('table').child('queued_lines').toString())
      .to.equal('SEQ1.TABLE.QUEUED_LINES');
  });

  it('accepts dotted child names', () => {
    const path = FieldPath.of('pcap').child('bits0.capture');
    expect(path.segments).to.deep.equal(['PCAP', 'BITS0', 'CAPTURE']);
    expect(path.block).to.equal('PCAP');
  });

  it('leaves the parent unchanged when deriving a child', () => {
    const parent = FieldPath.of('PGEN1');
    parent.child('OUT');
    expect(parent.toString()).to.equal('PGEN1');
  });

  it('passes existing paths through resolvePath', () => {
    const path = FieldPath.of('CLOCK1.PERIOD');
    expect(resolvePath(path)).to.equal(path);
    expect(resolvePath('clock1.period').toString()).to.equal('CLOCK1.PERIOD');
  });
});
