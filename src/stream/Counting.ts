import { CardinalityEstimator } from '../estimator';
import { DEFAULT_ESTIMATOR_CONFIG } from '../common/Config';
import type { LineProducer } from './LineSource';
import { clientIps } from './ClientIpExtractor';

export type ItemSource = AsyncIterable<string> | Iterable<string>;

export interface Timed<T> {
  readonly result: T;
  readonly seconds: number;
}

export interface CountComparison {
  readonly exact: Timed<number>;
  readonly approximate: Timed<number>;
}

/**
 * Ground-truth distinct count. Memory grows with the number of distinct items.
 */
export async function countExact(items: ItemSource): Promise<number> {
  const seen = new Set<string>();
  for await (const item of items) {
    seen.add(item);
  }
  return seen.size;
}

export async function countApproximate(
  items: ItemSource,
  precision: number = DEFAULT_ESTIMATOR_CONFIG.precision
): Promise<number> {
  const estimator = CardinalityEstimator.create(precision);
  for await (const item of items) {
    estimator.add(item);
  }
  return estimator.count();
}

export async function timed<T>(fn: () => Promise<T>): Promise<Timed<T>> {
  const start = performance.now();
  const result = await fn();
  return { result, seconds: (performance.now() - start) / 1000 };
}

/**
 * Count distinct client IPs twice, once exactly and once with the
 * estimator. Each pass takes its own read of the source.
 */
export async function compareUniqueIps(
  source: LineProducer,
  precision: number = DEFAULT_ESTIMATOR_CONFIG.precision
): Promise<CountComparison> {
  const exact = await timed(() => countExact(clientIps(source())));
  const approximate = await timed(() => countApproximate(clientIps(source()), precision));
  return { exact, approximate };
}
