import { applyFilter, contextsOf, countingStream } from '../../test/testHelpers';
import { InvalidConfigurationError } from '../errors';
import { simulatedInteraction } from '../interactions';
import { Context } from '../types';

import { Scale } from './scale';

const withContexts = (contexts: Context[]) =>
  contexts.map((context) => simulatedInteraction(context, [0], [0]));

describe('Scale', () => {
  it('standardizes numeric features by default', async () => {
    expect(contextsOf(await applyFilter(new Scale(), withContexts([[1], [3]])))).toEqual([[-1], [1]]);
  });

  it('scales to the unit interval and leaves other values alone', async () => {
    const scaled = await applyFilter(
      new Scale({ shift: 'min', scale: 'minmax' }),
      withContexts([
        [1, 10],
        [3, 10],
        [5, 's'],
      ]),
    );
    expect(contextsOf(scaled)).toEqual([
      [0, 0],
      [0.5, 0],
      [1, 's'],
    ]);
  });

  it('takes fixed shift and scale values', async () => {
    const scaled = await applyFilter(new Scale({ shift: 1, scale: 2 }), withContexts([[1], [4]]));
    expect(contextsOf(scaled)).toEqual([[0], [6]]);
  });

  it('does not shift sparse contexts', async () => {
    const scaled = await applyFilter(
      new Scale({ scale: 'maxabs' }),
      withContexts([{ a: 2 }, { a: -4 }, {}]),
    );
    expect(contextsOf(scaled)).toEqual([{ a: 0.5 }, { a: -1 }, {}]);
  });

  it('fits on the first interactions only and streams the rest', async () => {
    const { items, pulled } = countingStream(withContexts([[1], [3], [5], [7], [9]]));
    const scaled: Context[] = [];
    for await (const interaction of new Scale({ shift: 'min', scale: 'minmax', using: 2 }).filter(items)) {
      scaled.push(interaction.context);
      if (scaled.length === 3) {
        break;
      }
    }
    expect(scaled).toEqual([[0], [1], [2]]);
    expect(pulled()).toBe(3);
  });

  it('fits over long sequences', async () => {
    const count = 300001;
    const long = withContexts(Array.from({ length: count }, (_, i) => [i - 100000]));

    const minmax = await applyFilter(new Scale({ shift: 'min', scale: 'minmax' }), long);
    expect(minmax[0].context).toEqual([0]);
    expect(minmax[count - 1].context).toEqual([1]);

    const maxabs = await applyFilter(new Scale({ shift: 0, scale: 'maxabs' }), long);
    expect(maxabs[0].context).toEqual([-0.5]);
    expect(maxabs[count - 1].context).toEqual([1]);
  });

  it('validates its options', () => {
    expect(() => new Scale({ using: -1 })).toThrow(InvalidConfigurationError);
    expect(() => new Scale({ scale: Infinity })).toThrow(InvalidConfigurationError);
  });
});
