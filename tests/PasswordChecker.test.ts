import { describe, it, expect, beforeEach } from 'vitest';
import { MembershipFilter, checkUniqueness, formatPasswordReport } from '../src/filter';
import { UniquenessStatus } from '../src/common/Types';

describe('checkUniqueness', () => {
  let filter: MembershipFilter;

  beforeEach(() => {
    filter = MembershipFilter.create(1000, 3);
    for (const password of ['password123', 'admin123', 'qwerty123']) {
      filter.add(password);
    }
  });

  it('classifies candidates in input order', () => {
    const results = checkUniqueness(filter, ['password123', 'newpassword', 'admin123', 'guest']);

    expect(Array.from(results.entries())).toEqual([
      ['password123', UniquenessStatus.ALREADY_USED],
      ['newpassword', UniquenessStatus.UNIQUE],
      ['admin123', UniquenessStatus.ALREADY_USED],
      ['guest', UniquenessStatus.UNIQUE],
    ]);
  });

  it('remembers unique candidates for later batches', () => {
    checkUniqueness(filter, ['password123', 'newpassword', 'admin123', 'guest']);

    const again = checkUniqueness(filter, ['newpassword']);

    expect(again.get('newpassword')).toBe(UniquenessStatus.ALREADY_USED);
  });

  it('catches repeats within the same batch, last status winning', () => {
    const results = checkUniqueness(filter, ['fresh-one', 'fresh-one']);

    expect(results.size).toBe(1);
    expect(results.get('fresh-one')).toBe(UniquenessStatus.ALREADY_USED);
  });

  it('keys by string form', () => {
    const results = checkUniqueness(filter, [9001, '9001']);

    expect(Array.from(results.entries())).toEqual([['9001', UniquenessStatus.ALREADY_USED]]);
  });

  it('marks empty and absent candidates invalid without adding them', () => {
    const before = filter.snapshot();

    const results = checkUniqueness(filter, [null, '', '   ', undefined]);

    expect(Array.from(results.entries())).toEqual([
      ['null', UniquenessStatus.INVALID],
      ['', UniquenessStatus.INVALID],
      ['   ', UniquenessStatus.INVALID],
      ['undefined', UniquenessStatus.INVALID],
    ]);
    expect(filter.snapshot()).toEqual(before);
  });

  it('gives an absent candidate its own report line', () => {
    const lines = formatPasswordReport(checkUniqueness(filter, [null, '', 'guest']));

    expect(lines).toEqual([
      "Password 'null' — invalid (empty/absent).",
      "Password '' — invalid (empty/absent).",
      "Password 'guest' — unique.",
    ]);
  });
});

describe('formatPasswordReport', () => {
  it('renders one line per entry', () => {
    const report = new Map([
      ['password123', UniquenessStatus.ALREADY_USED],
      ['guest', UniquenessStatus.UNIQUE],
      ['', UniquenessStatus.INVALID],
    ]);

    expect(formatPasswordReport(report)).toEqual([
      "Password 'password123' — already used.",
      "Password 'guest' — unique.",
      "Password '' — invalid (empty/absent).",
    ]);
  });
});
