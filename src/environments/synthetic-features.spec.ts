import { InvalidConfigurationError } from '../errors';

import { assertTerms, euclideanDistance, interactionFeatures, oneHotVectors } from './synthetic-features';

describe('interactionFeatures', () => {
  it('multiplies out each term', () => {
    expect(interactionFeatures([2, 3], [1, 10], ['a'])).toEqual([1, 10]);
    expect(interactionFeatures([2, 3], [1, 10], ['xa'])).toEqual([2, 20, 3, 30]);
    expect(interactionFeatures([2, 3], [1, 10], ['x', 'a'])).toEqual([2, 3, 1, 10]);
  });

  it('only accepts x and a terms', () => {
    expect(() => assertTerms(['xb'])).toThrow(InvalidConfigurationError);
    expect(() => assertTerms([])).toThrow(InvalidConfigurationError);
  });
});

describe('oneHotVectors', () => {
  it('builds the identity', () => {
    expect(oneHotVectors(3)).toEqual([
      [1, 0, 0],
      [0, 1, 0],
      [0, 0, 1],
    ]);
  });
});

describe('euclideanDistance', () => {
  it('measures straight lines', () => {
    expect(euclideanDistance([0, 0], [3, 4])).toBe(5);
  });
});
