export type { LineProducer } from './LineSource';
export type { LogRecord } from './ClientIpExtractor';
export type { ItemSource, Timed, CountComparison } from './Counting';

export { fileLines, ensureFileExists } from './LineSource';
export { parseRecord, extractClientIp, clientIps } from './ClientIpExtractor';
export { countExact, countApproximate, timed, compareUniqueIps } from './Counting';
export { formatComparisonTable } from './ComparisonTable';
