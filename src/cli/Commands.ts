import { resolveEstimatorConfig, resolveFilterConfig } from '../common/Config';
import type { LogComparisonConfig } from '../common/Config';
import { MembershipFilter, checkUniqueness, formatPasswordReport } from '../filter';
import {
  compareUniqueIps,
  ensureFileExists,
  fileLines,
  formatComparisonTable,
} from '../stream';
import type { PasswordCheckOptions } from './CLIParser';

export type OutputSink = (line: string) => void;

const defaultSink: OutputSink = (line) => console.log(line);

export function runPasswordCheck(options: PasswordCheckOptions, write: OutputSink = defaultSink): void {
  const { bitArraySize, hashCount } = resolveFilterConfig(options.filter);
  const filter = MembershipFilter.create(bitArraySize, hashCount);

  for (const password of options.existing) {
    filter.add(password);
  }

  const results = checkUniqueness(filter, options.candidates);
  for (const line of formatPasswordReport(results)) {
    write(line);
  }
}

export async function runLogComparison(
  config: LogComparisonConfig,
  write: OutputSink = defaultSink
): Promise<void> {
  const { precision } = resolveEstimatorConfig({ precision: config.precision });
  await ensureFileExists(config.logPath);

  const comparison = await compareUniqueIps(fileLines(config.logPath), precision);
  for (const line of formatComparisonTable(comparison)) {
    write(line);
  }
}
