/**
 * CardinalityEstimator - HyperLogLog distinct counter
 *
 * m = 2^precision one-byte registers. Each add() hashes the item to 64 bits,
 * uses the top `precision` bits as the register index and records the
 * position of the first set bit in the remaining 64 - precision bits.
 *
 * Memory: 2^precision bytes, independent of how many items are added.
 * Standard error: ~1.04 / sqrt(m).
 */

import { validateEstimatorConfig } from '../common/Config';
import { InvalidArgumentError } from '../common/Errors';
import type { CardinalityEstimatorStats } from '../common/Types';
import type { ICardinalityEstimator } from '../interfaces/Sketch';
import { hash64 } from '../hashing';
import type { Hash64 } from '../hashing';

const TWO_POW_64 = 2 ** 64;

export interface HashSplit {
  readonly index: number;
  readonly rho: number;
}

/**
 * Split a 64-bit hash into its register index (top `precision` bits) and
 * rho, one plus the leading zeros of the remaining 64 - precision bits.
 * An all-zero remainder gives 64 - precision + 1.
 */
export function splitHash({ hi, lo }: Hash64, precision: number): HashSplit {
  const index = hi >>> (32 - precision);

  // w = (x << precision) truncated to 64 bits
  const wHi = ((hi << precision) | (lo >>> (32 - precision))) >>> 0;
  const wLo = (lo << precision) >>> 0;

  if (wHi !== 0) {
    return { index, rho: Math.clz32(wHi) + 1 };
  }
  if (wLo !== 0) {
    return { index, rho: 32 + Math.clz32(wLo) + 1 };
  }
  return { index, rho: 64 - precision + 1 };
}

export class CardinalityEstimator implements ICardinalityEstimator {
  private readonly precision: number;
  private readonly registerCount: number;
  private readonly registers: Uint8Array;
  private readonly alpha: number;

  private constructor(precision: number) {
    this.precision = precision;
    this.registerCount = 1 << precision;
    this.registers = new Uint8Array(this.registerCount);
    this.alpha = CardinalityEstimator.alphaFor(this.registerCount);
  }

  public static create(precision: number): CardinalityEstimator {
    validateEstimatorConfig({ precision });
    return new CardinalityEstimator(precision);
  }

  private static alphaFor(m: number): number {
    switch (m) {
      case 16: return 0.673;
      case 32: return 0.697;
      case 64: return 0.709;
      default: return 0.7213 / (1 + 1.079 / m);
    }
  }

  public add(item: string): void {
    const { index, rho } = splitHash(hash64(item), this.precision);
    if (rho > this.registers[index]!) {
      this.registers[index] = rho;
    }
  }

  public count(): number {
    const m = this.registerCount;
    let inverseSum = 0;
    let zeros = 0;

    for (const register of this.registers) {
      inverseSum += 2 ** -register;
      if (register === 0) {
        zeros++;
      }
    }

    let estimate = (this.alpha * m * m) / inverseSum;

    // Small range: linear counting over the empty registers
    if (estimate <= 2.5 * m && zeros > 0) {
      estimate = m * Math.log(m / zeros);
    }

    // Large range: hash space saturation
    if (estimate > TWO_POW_64 / 30) {
      estimate = -TWO_POW_64 * Math.log(1 - estimate / TWO_POW_64);
    }

    return estimate;
  }

  /**
   * Fold `other` into this estimator by element-wise max of registers.
   */
  public merge(other: CardinalityEstimator): void {
    if (other.precision !== this.precision) {
      throw new InvalidArgumentError(
        `Cannot merge estimator of precision ${other.precision} into precision ${this.precision}`
      );
    }
    for (const [i, theirs] of other.registers.entries()) {
      if (theirs > this.registers[i]!) {
        this.registers[i] = theirs;
      }
    }
  }

  public snapshot(): Uint8Array {
    return this.registers.slice();
  }

  public getStats(): CardinalityEstimatorStats {
    let zeroRegisters = 0;
    for (const register of this.registers) {
      if (register === 0) {
        zeroRegisters++;
      }
    }
    return {
      precision: this.precision,
      registerCount: this.registerCount,
      alpha: this.alpha,
      zeroRegisters,
      standardError: 1.04 / Math.sqrt(this.registerCount),
    };
  }
}
