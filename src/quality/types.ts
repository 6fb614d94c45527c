import type { ThresholdConfig } from '@/core/thresholds';

export type Scalar = number | string | null;

export type Row = Readonly<Record<string, Scalar>>;

export interface Dataset {
  readonly columns: readonly string[];
  readonly records: readonly Row[];
}

export type CheckStatus = 'passed' | 'warning' | 'failed';

export type IssueType =
  | 'null_values'
  | 'missing_column'
  | 'type_mismatch'
  | 'unexpected_column'
  | 'invalid_category'
  | 'zscore_anomaly'
  | 'out_of_range'
  | 'missing_reference'
  | 'orphaned_record'
  | 'rule_violation'
  | 'empty_dataset'
  | 'check_error';

export interface Issue {
  readonly type: IssueType;
  readonly column: string | null;
  readonly count: number | null;
  readonly details: string;
}

export interface CheckResult {
  check_name: string;
  table?: string;
  status: CheckStatus;
  issues: Issue[];
  timestamp: string;
}

export interface QualityReport {
  results: CheckResult[];
  overall_status: CheckStatus;
  generated_at: string;
}

/**
 * A quality check. Implementations must not mutate the dataset or config and
 * must not keep state between calls.
 */
export interface Check {
  readonly name: string;
  run(dataset: Dataset, config: ThresholdConfig): CheckResult;
}
