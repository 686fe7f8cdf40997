import type { LossZoneId } from "./treaty.schema";

/** Annual losses (USD), one value per simulated year. Order has no statistical meaning. */
export type LossSample = readonly number[];

/** Treaty-layer loss per year; same length and order as the LossSample it came from. */
export type LayerLoss = readonly number[];

export type UnavailableReason =
  | "zeroExpectedLoss"
  | "zeroLimit"
  | "zeroExposure"
  | "zeroSpread"
  | "tooFewObservations"
  | "tooFewYears";

/** Metric that may be undefined for a given sample; never overloaded onto NaN or null. */
export type MetricValue =
  | { available: true; value: number }
  | { available: false; reason: UnavailableReason };

export type SummaryMetrics = {
  sampleSize: number;
  expectedLoss: number;
  stdDev: number;
  coefficientOfVariation: MetricValue;
  /** Share of years with a layer payout, 0–1. */
  payoutProbability: number;
  /** EL as a percentage of the limit. */
  elRatio: MetricValue;
  suggestedPremium: number;
  exposureValue: number;
  /** EL per $100 of exposure, in cents. */
  lossCost: MetricValue;
  skewness: MetricValue;
  maxLoss: number;
  p95: number;
  p99: number;
  loss1In200: MetricValue;
};

export type ExceedancePoint = {
  returnPeriod: number;
  loss: number;
};

/** Sorted by descending loss; first point carries the largest return period. */
export type ExceedanceCurve = ExceedancePoint[];

export type AnalysisWarningCode = "UNDEFINED_METRIC" | "UNAVAILABLE_TAIL_METRIC" | "HIGH_RISK_ZONE";

/** Non-fatal condition attached to a report; the rest of the report still renders. */
export type AnalysisWarning = {
  code: AnalysisWarningCode;
  metric?: keyof SummaryMetrics;
  message: string;
};

export type TreatyAnalysis = {
  sampleSize: number;
  zone?: LossZoneId;
  layerLoss: LayerLoss;
  metrics: SummaryMetrics;
  curve: ExceedanceCurve;
  warnings: AnalysisWarning[];
};
