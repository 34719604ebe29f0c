export type { UniquenessReport } from './PasswordChecker';

export { MembershipFilter } from './MembershipFilter';
export { checkUniqueness, formatPasswordReport } from './PasswordChecker';
