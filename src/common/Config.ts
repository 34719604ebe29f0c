import { InvalidArgumentError } from './Errors';

export const MIN_PRECISION = 4;
export const MAX_PRECISION = 18;

export interface MembershipFilterConfig {
  bitArraySize: number;
  hashCount: number;
}

export interface CardinalityEstimatorConfig {
  precision: number;
}

export interface LogComparisonConfig {
  logPath: string;
  precision: number;
}

export const DEFAULT_FILTER_CONFIG: Readonly<MembershipFilterConfig> = {
  bitArraySize: 1000,
  hashCount: 3,
};

export const DEFAULT_ESTIMATOR_CONFIG: Readonly<CardinalityEstimatorConfig> = {
  precision: 14,
};

export const DEFAULT_LOG_COMPARISON_CONFIG: Readonly<LogComparisonConfig> = {
  logPath: './lms-stage-access.log',
  precision: DEFAULT_ESTIMATOR_CONFIG.precision,
};

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

export function validateFilterConfig(config: MembershipFilterConfig): MembershipFilterConfig {
  if (!isPositiveInteger(config.bitArraySize)) {
    throw new InvalidArgumentError(
      `bitArraySize must be a positive integer, got ${config.bitArraySize}`
    );
  }
  if (!isPositiveInteger(config.hashCount)) {
    throw new InvalidArgumentError(
      `hashCount must be a positive integer, got ${config.hashCount}`
    );
  }
  return config;
}

export function validateEstimatorConfig(config: CardinalityEstimatorConfig): CardinalityEstimatorConfig {
  const { precision } = config;
  if (!Number.isInteger(precision) || precision < MIN_PRECISION || precision > MAX_PRECISION) {
    throw new InvalidArgumentError(
      `precision must be an integer in [${MIN_PRECISION}, ${MAX_PRECISION}], got ${precision}`
    );
  }
  return config;
}

export function resolveFilterConfig(config?: Partial<MembershipFilterConfig>): MembershipFilterConfig {
  return validateFilterConfig({ ...DEFAULT_FILTER_CONFIG, ...config });
}

export function resolveEstimatorConfig(
  config?: Partial<CardinalityEstimatorConfig>
): CardinalityEstimatorConfig {
  return validateEstimatorConfig({ ...DEFAULT_ESTIMATOR_CONFIG, ...config });
}
