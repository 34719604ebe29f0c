export type { HashSplit } from './CardinalityEstimator';

export { CardinalityEstimator, splitHash } from './CardinalityEstimator';
