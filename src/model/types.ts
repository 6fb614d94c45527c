import type { Scalar } from '@/quality/types';
import type { SummaryStatistics } from '@/quality/stats';

export type ModelTask = 'regression' | 'classification';

export type ClinicalOutputType = 'age' | 'bmi' | 'children' | 'charges';

export interface RegressionMetrics {
  mse: number;
  rmse: number;
  mae: number;
  /** null when the actual values are constant (SS_tot == 0). */
  r2: number | null;
}

export interface ClassificationMetrics {
  accuracy: number;
  precision: number;
  recall: number;
  f1: number;
  /** [[tn, fp], [fn, tp]] */
  confusion_matrix: [[number, number], [number, number]];
}

export type PerformanceMetricName = 'rmse' | 'mae' | 'r2';

export interface MetricThresholdCheck {
  metric: PerformanceMetricName;
  value: number | null;
  threshold: number;
  comparison: 'max' | 'min';
  passed: boolean;
}

export interface PerformanceAssessment {
  status: 'passed' | 'failed';
  checks: MetricThresholdCheck[];
}

export interface ProtectedAttributeGroup {
  attribute_name: string;
  group_value: string;
  size: number;
  mean_prediction: number;
  std_prediction: number;
  outcome_rate: number;
  /** Same value as mean_prediction; kept for report consumers. */
  prediction_rate: number;
  false_positive_rate: number;
  /** Group smaller than min_group_size; its statistics are noisy. */
  low_confidence: boolean;
}

export interface DisparityMetric {
  /** max / min; null when min <= 0. */
  ratio: number | null;
  difference: number;
}

export type DisparityStatistic = 'mean_prediction' | 'prediction_rate' | 'false_positive_rate';

export interface AttributeBiasAnalysis {
  groups: Record<string, ProtectedAttributeGroup>;
  disparity_metrics: Partial<Record<DisparityStatistic, DisparityMetric>>;
  /** mean_prediction ratio above bias_threshold. */
  flagged: boolean;
  binned: boolean;
}

export type BiasAnalysis = Record<string, AttributeBiasAnalysis>;

export type ComplianceStatus = 'compliant' | 'non_compliant';

export type RuleDetailValue = number | string | boolean | null;

export interface HealthcareRuleResult {
  rule: string;
  passed: boolean;
  details: Record<string, RuleDetailValue>;
}

export interface ClinicalContext {
  setting?: 'standard' | 'emergency';
  population?: 'general' | 'pediatric';
}

export interface HealthcareValidation {
  output_type: ClinicalOutputType;
  total_outputs: number;
  statistics: SummaryStatistics;
  rules: HealthcareRuleResult[];
  passed: boolean;
}

export interface ModelValidationInput {
  model_name: string;
  model_version: string;
  predictions: readonly number[];
  actual: readonly number[];
  protected_attributes?: Readonly<Record<string, readonly Scalar[]>>;
  task?: ModelTask;
  output_type?: ClinicalOutputType;
  clinical_context?: ClinicalContext;
}

export interface ModelValidationReport {
  model_name: string;
  model_version: string;
  timestamp: string;
  task: ModelTask;
  metrics: RegressionMetrics;
  performance: PerformanceAssessment;
  classification_metrics: ClassificationMetrics | null;
  bias_analysis: BiasAnalysis;
  healthcare_validation: HealthcareValidation | null;
  compliance_status: ComplianceStatus;
}
