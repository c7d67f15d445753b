import { InvalidConfigurationError } from '../errors';

export function assertCount(name: string, value: number, minimum: number): void {
  if (!Number.isInteger(value) || value < minimum) {
    throw new InvalidConfigurationError(`${name} must be an integer of at least ${minimum}`, {
      [name]: value,
    });
  }
}

/** `n` one-hot vectors of length `n`, the actions of problems without action features. */
export function oneHotVectors(n: number): number[][] {
  return Array.from({ length: n }, (_, i) => Array.from({ length: n }, (__, j) => (i === j ? 1 : 0)));
}

/**
 * Checks feature-interaction terms such as `a`, `x`, `xa` or `xxa`: each letter names a vector
 * (x: context, a: action) and a term is the outer product of its letters.
 */
export function assertTerms(terms: readonly string[]): void {
  if (!terms.length || terms.some((term) => !/^[xa]+$/.test(term))) {
    throw new InvalidConfigurationError('Interaction terms may only combine "x" and "a"', { terms });
  }
}

export function interactionFeatures(
  context: readonly number[],
  action: readonly number[],
  terms: readonly string[],
): number[] {
  const features: number[] = [];
  for (const term of terms) {
    let product = [1];
    for (const letter of term) {
      const vector = letter === 'x' ? context : action;
      product = product.flatMap((left) => vector.map((right) => left * right));
    }
    features.push(...product);
  }
  return features;
}

export function euclideanDistance(left: readonly number[], right: readonly number[]): number {
  let sum = 0;
  left.forEach((value, i) => {
    sum += (value - right[i]) ** 2;
  });
  return Math.sqrt(sum);
}
