import { MalformedRecordError } from '../errors';
import { collect } from '../util';

import { LibSvmReader, ManikReader } from './libsvm-reader';
import { DiskSource } from './line-source';

describe('LibSvmReader', () => {
  it('reads sparse rows keyed by feature index', async () => {
    const rows = await collect(new LibSvmReader().read(new DiskSource('./test/data/points.libsvm').read()));
    expect(rows).toEqual([
      { index: 0, features: { '1': 0.5, '3': 2 }, label: 1 },
      { index: 1, features: { '2': 1.25 }, label: 0 },
      { index: 2, features: { '1': -1 }, label: 1 },
    ]);
  });

  it('reads comma separated labels as a label set', async () => {
    const rows = await collect(new LibSvmReader().read(['1,2 1:1', '1:3']));
    expect(rows).toEqual([
      { index: 0, features: { '1': 1 }, label: [1, 2] },
      { index: 1, features: { '1': 3 }, label: [] },
    ]);
  });

  it('skips pairs that are not index:value', async () => {
    const skipped: MalformedRecordError[] = [];
    const reader = new LibSvmReader({ onMalformedRecord: (error) => skipped.push(error) });
    const rows = await collect(reader.read(['a 1:x', 'b 2:2']));
    expect(rows).toEqual([{ index: 1, features: { '2': 2 }, label: 'b' }]);
    expect(skipped[0].context).toEqual({ sourceId: 'libsvm', rowIndex: 0, value: 'a 1:x' });
  });

  it('throws malformed pairs in strict mode', async () => {
    await expect(collect(new LibSvmReader({ strict: true }).read(['1 :2']))).rejects.toThrow(
      MalformedRecordError,
    );
  });
});

describe('ManikReader', () => {
  it('skips the header and always reads label sets', async () => {
    const rows = await collect(new ManikReader().read(new DiskSource('./test/data/tags.manik').read()));
    expect(rows).toEqual([
      { index: 0, features: { '1': 1, '2': 0.5 }, label: [0, 4] },
      { index: 1, features: { '3': 1 }, label: [2] },
      { index: 2, features: { '4': 2 }, label: [1, 3] },
    ]);
  });

  it('rejects a file without the counts header', async () => {
    await expect(collect(new ManikReader().read(['1 1:1']))).rejects.toThrow(
      'Expected a "rows features labels" header',
    );
  });
});
