import type {
  AddResult,
  CardinalityEstimatorStats,
  MembershipFilterStats,
} from '../common/Types';

export interface IMembershipFilter {
  normalize(item: unknown): string;
  add(item: unknown): AddResult;

  /**
   * May return true for an item never added. Never returns false for an
   * item that was added.
   */
  contains(item: unknown): boolean;
  getStats(): MembershipFilterStats;
}

export interface ICardinalityEstimator {
  add(item: string): void;

  /**
   * Point estimate of the number of distinct items added so far.
   * Does not mutate the registers.
   */
  count(): number;
  getStats(): CardinalityEstimatorStats;
}
