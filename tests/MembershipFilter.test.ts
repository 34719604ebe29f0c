import { describe, it, expect } from 'vitest';
import { MembershipFilter } from '../src/filter';
import { AddResult } from '../src/common/Types';
import { InvalidArgumentError } from '../src/common/Errors';

describe('MembershipFilter', () => {
  describe('create', () => {
    it('rejects non-positive or fractional sizes', () => {
      expect(() => MembershipFilter.create(0, 3)).toThrow(InvalidArgumentError);
      expect(() => MembershipFilter.create(-10, 3)).toThrow(InvalidArgumentError);
      expect(() => MembershipFilter.create(10.5, 3)).toThrow(InvalidArgumentError);
      expect(() => MembershipFilter.create(Number.NaN, 3)).toThrow(InvalidArgumentError);
    });

    it('rejects non-positive hash counts', () => {
      expect(() => MembershipFilter.create(100, 0)).toThrow(InvalidArgumentError);
      expect(() => MembershipFilter.create(100, 1.5)).toThrow(InvalidArgumentError);
    });

    it('packs eight bits per byte', () => {
      expect(MembershipFilter.create(1001, 3).getStats().byteSize).toBe(126);
      expect(MembershipFilter.create(8, 1).getStats().byteSize).toBe(1);
      expect(MembershipFilter.create(1, 1).getStats().byteSize).toBe(1);
    });

    it('starts with every bit clear', () => {
      const filter = MembershipFilter.create(64, 2);
      expect(Array.from(filter.snapshot())).toEqual(new Array(8).fill(0));
      expect(filter.getStats().setBits).toBe(0);
      expect(filter.getStats().estimatedFalsePositiveRate).toBe(0);
    });
  });

  describe('withCapacity', () => {
    it('derives size and hash count from the expected load', () => {
      const stats = MembershipFilter.withCapacity(1000, 0.01).getStats();
      expect(stats.bitArraySize).toBe(9586);
      expect(stats.hashCount).toBe(7);
    });

    it('rejects rates outside (0, 1)', () => {
      expect(() => MembershipFilter.withCapacity(1000, 0)).toThrow(InvalidArgumentError);
      expect(() => MembershipFilter.withCapacity(1000, 1)).toThrow(InvalidArgumentError);
    });
  });

  describe('normalize', () => {
    it('maps absent values to the empty string', () => {
      const filter = MembershipFilter.create(100, 3);
      expect(filter.normalize(null)).toBe('');
      expect(filter.normalize(undefined)).toBe('');
    });

    it('stringifies non-string values', () => {
      const filter = MembershipFilter.create(100, 3);
      expect(filter.normalize('secret')).toBe('secret');
      expect(filter.normalize(42)).toBe('42');
      expect(filter.normalize(true)).toBe('true');
    });
  });

  describe('add / contains', () => {
    it('rejects empty input without touching the bits', () => {
      const filter = MembershipFilter.create(256, 4);
      filter.add('seed');
      const before = filter.snapshot();

      expect(filter.add(null)).toBe(AddResult.REJECTED);
      expect(filter.add(undefined)).toBe(AddResult.REJECTED);
      expect(filter.add('')).toBe(AddResult.REJECTED);
      expect(filter.add('   ')).toBe(AddResult.REJECTED);

      expect(filter.snapshot()).toEqual(before);
    });

    it('never reports empty input as contained', () => {
      const filter = MembershipFilter.create(1, 1);
      filter.add('x');
      expect(filter.contains('')).toBe(false);
      expect(filter.contains(' \t ')).toBe(false);
      expect(filter.contains(null)).toBe(false);
    });

    it('sets between one and hashCount bits per item', () => {
      const filter = MembershipFilter.create(1000, 3);
      expect(filter.add('password123')).toBe(AddResult.APPLIED);
      const { setBits } = filter.getStats();
      expect(setBits).toBeGreaterThanOrEqual(1);
      expect(setBits).toBeLessThanOrEqual(3);
    });

    it('has no false negatives', () => {
      const filter = MembershipFilter.create(10000, 5);
      const items = Array.from({ length: 500 }, (_, i) => `user-${i}@example.test`);
      for (const item of items) {
        filter.add(item);
      }
      for (const item of items) {
        expect(filter.contains(item)).toBe(true);
      }
    });

    it('keeps earlier items after many later additions', () => {
      const filter = MembershipFilter.create(2048, 3);
      filter.add('first');
      for (let i = 0; i < 300; i++) {
        filter.add(`later-${i}`);
        expect(filter.contains('first')).toBe(true);
      }
    });

    it('never clears a bit once set', () => {
      const filter = MembershipFilter.create(512, 3);
      let previous = filter.snapshot();
      for (let i = 0; i < 100; i++) {
        filter.add(`item-${i}`);
        const current = filter.snapshot();
        const kept = Array.from(previous, (byte, b) => byte & (current[b] ?? 0));
        expect(kept).toEqual(Array.from(previous));
        previous = current;
      }
    });

    it('treats a number and its string form as the same item', () => {
      const filter = MembershipFilter.create(1000, 3);
      filter.add(42);
      expect(filter.contains('42')).toBe(true);
    });

    it('reports an empty filter as containing nothing', () => {
      const filter = MembershipFilter.create(1000, 3);
      expect(filter.contains('anything')).toBe(false);
    });

    it('produces false positives once saturated', () => {
      const filter = MembershipFilter.create(1, 1);
      filter.add('x');
      expect(filter.contains('never-added')).toBe(true);
      expect(filter.getStats().estimatedFalsePositiveRate).toBe(1);
    });
  });

  describe('merge', () => {
    it('reports items from both filters', () => {
      const left = MembershipFilter.create(1024, 4);
      const right = MembershipFilter.create(1024, 4);
      left.add('alpha');
      right.add('beta');

      left.merge(right);

      expect(left.contains('alpha')).toBe(true);
      expect(left.contains('beta')).toBe(true);
    });

    it('matches a filter that saw every item', () => {
      const left = MembershipFilter.create(300, 3);
      const right = MembershipFilter.create(300, 3);
      const both = MembershipFilter.create(300, 3);
      for (let i = 0; i < 40; i++) {
        (i % 2 === 0 ? left : right).add(`k${i}`);
        both.add(`k${i}`);
      }

      left.merge(right);

      expect(left.snapshot()).toEqual(both.snapshot());
    });

    it('refuses filters of a different shape', () => {
      const filter = MembershipFilter.create(1024, 4);
      expect(() => filter.merge(MembershipFilter.create(1024, 3))).toThrow(InvalidArgumentError);
      expect(() => filter.merge(MembershipFilter.create(512, 4))).toThrow(InvalidArgumentError);
    });
  });
});
