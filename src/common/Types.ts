/**
 * Common type definitions shared by the sketches and the drivers.
 */

export enum AddResult {
  APPLIED = 'applied',
  REJECTED = 'rejected',
}

export enum UniquenessStatus {
  ALREADY_USED = 'already used',
  UNIQUE = 'unique',
  INVALID = 'invalid (empty/absent)',
}

export interface MembershipFilterStats {
  readonly bitArraySize: number;
  readonly hashCount: number;
  readonly byteSize: number;
  readonly setBits: number;
  readonly estimatedFalsePositiveRate: number;
}

export interface CardinalityEstimatorStats {
  readonly precision: number;
  readonly registerCount: number;
  readonly alpha: number;
  readonly zeroRegisters: number;
  readonly standardError: number;
}
