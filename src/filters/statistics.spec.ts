import { median, mode, quantile, standardDeviation } from './statistics';

describe('statistics', () => {
  it('interpolates quantiles', () => {
    expect(quantile([4, 1, 3, 2], 0.25)).toBe(1.75);
    expect(quantile([4, 1, 3, 2], 1)).toBe(4);
  });

  it('computes the median of odd and even samples', () => {
    expect(median([3, 1, 2])).toBe(2);
    expect(median([1, 2, 3, 4])).toBe(2.5);
  });

  it('computes the population standard deviation', () => {
    expect(standardDeviation([2, 4, 4, 4, 5, 5, 7, 9])).toBe(2);
  });

  it('breaks mode ties by first appearance', () => {
    expect(mode([3, 'a', 'a', 3])).toBe(3);
    expect(mode(['3', 3, 3])).toBe(3);
    expect(mode([])).toBeNull();
  });
});
