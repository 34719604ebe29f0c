import { validateFilterConfig } from '../common/Config';
import { InvalidArgumentError } from '../common/Errors';
import { AddResult } from '../common/Types';
import type { MembershipFilterStats } from '../common/Types';
import type { IMembershipFilter } from '../interfaces/Sketch';
import { murmur3 } from '../hashing';

/**
 * Bloom filter over a packed bit array (8 positions per byte).
 *
 * Bits are only ever set, so anything added through add() is always
 * reported by contains(). Memory is fixed at ceil(bitArraySize / 8) bytes.
 */
export class MembershipFilter implements IMembershipFilter {
  private readonly bits: Uint8Array;
  private readonly bitArraySize: number;
  private readonly hashCount: number;

  private constructor(bitArraySize: number, hashCount: number) {
    this.bitArraySize = bitArraySize;
    this.hashCount = hashCount;
    this.bits = new Uint8Array(Math.ceil(bitArraySize / 8));
  }

  public static create(bitArraySize: number, hashCount: number): MembershipFilter {
    validateFilterConfig({ bitArraySize, hashCount });
    return new MembershipFilter(bitArraySize, hashCount);
  }

  /**
   * Size a filter for `expectedItems` entries at the given false positive rate.
   */
  public static withCapacity(expectedItems: number, falsePositiveRate: number): MembershipFilter {
    if (falsePositiveRate <= 0 || falsePositiveRate >= 1) {
      throw new InvalidArgumentError('falsePositiveRate must be between 0 and 1');
    }
    const { bitArraySize, hashCount } = MembershipFilter.calculateOptimalParams(
      expectedItems,
      falsePositiveRate
    );
    return MembershipFilter.create(bitArraySize, hashCount);
  }

  private static calculateOptimalParams(
    expectedItems: number,
    falsePositiveRate: number
  ): { bitArraySize: number; hashCount: number } {
    const n = Math.max(expectedItems, 1);

    const bitArraySize = Math.ceil(-(n * Math.log(falsePositiveRate)) / (Math.LN2 * Math.LN2));
    const hashCount = Math.max(1, Math.round((bitArraySize / n) * Math.LN2));

    return { bitArraySize, hashCount };
  }

  public normalize(item: unknown): string {
    if (item === null || item === undefined) {
      return '';
    }
    return typeof item === 'string' ? item : String(item);
  }

  public add(item: unknown): AddResult {
    const key = this.normalize(item);
    if (key.trim() === '') {
      return AddResult.REJECTED;
    }

    for (let seed = 0; seed < this.hashCount; seed++) {
      this.setBit(this.bitIndex(key, seed));
    }
    return AddResult.APPLIED;
  }

  public contains(item: unknown): boolean {
    const key = this.normalize(item);
    if (key.trim() === '') {
      return false;
    }

    for (let seed = 0; seed < this.hashCount; seed++) {
      if (!this.getBit(this.bitIndex(key, seed))) {
        return false;
      }
    }
    return true;
  }

  /**
   * OR the bits of `other` into this filter. Both filters must share
   * bitArraySize and hashCount.
   */
  public merge(other: MembershipFilter): void {
    if (other.bitArraySize !== this.bitArraySize || other.hashCount !== this.hashCount) {
      throw new InvalidArgumentError(
        `Cannot merge filters of shape ${other.bitArraySize}/${other.hashCount} ` +
        `into ${this.bitArraySize}/${this.hashCount}`
      );
    }
    for (const [i, byte] of other.bits.entries()) {
      this.bits[i]! |= byte;
    }
  }

  public snapshot(): Uint8Array {
    return this.bits.slice();
  }

  public getStats(): MembershipFilterStats {
    const setBits = this.countSetBits();
    return {
      bitArraySize: this.bitArraySize,
      hashCount: this.hashCount,
      byteSize: this.bits.length,
      setBits,
      estimatedFalsePositiveRate: Math.pow(setBits / this.bitArraySize, this.hashCount),
    };
  }

  private bitIndex(key: string, seed: number): number {
    return murmur3(key, seed) % this.bitArraySize;
  }

  private setBit(index: number): void {
    this.bits[index >>> 3]! |= 1 << (index & 7);
  }

  private getBit(index: number): boolean {
    return (this.bits[index >>> 3]! & (1 << (index & 7))) !== 0;
  }

  private countSetBits(): number {
    let total = 0;
    for (let byte of this.bits) {
      while (byte !== 0) {
        byte &= byte - 1;
        total++;
      }
    }
    return total;
  }
}
