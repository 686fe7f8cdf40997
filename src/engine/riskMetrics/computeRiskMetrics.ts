/**
 * Risk metrics engine: pure, no UI.
 * Reduces one LayerLoss snapshot to SummaryMetrics. A single descending-sorted copy
 * feeds every rank statistic (max, p95, p99, 1-in-200).
 */

import { LOSS_COST_SCALE, PREMIUM_LOADING, TAIL_RETURN_PERIOD } from "@/config/analysisDefaults";
import { available, unavailable } from "@/domain/treaty/metricValue";
import { InsufficientDataError } from "@/domain/treaty/treaty.errors";
import type { TreatyTerms } from "@/domain/treaty/treaty.schema";
import type {
  AnalysisWarning,
  LayerLoss,
  MetricValue,
  SummaryMetrics,
  UnavailableReason,
} from "@/domain/treaty/treaty.types";
import { adjustedSkewness, mean, percentileFromDescending, sampleStdDev, sortDescending } from "./statistics";

export type RiskMetricsResult = {
  metrics: SummaryMetrics;
  warnings: AnalysisWarning[];
};

/** Ratio as a MetricValue: unavailable when the denominator is 0. */
function ratio(numerator: number, denominator: number, reason: UnavailableReason, scale = 1): MetricValue {
  return denominator === 0 ? unavailable(reason) : available((numerator / denominator) * scale);
}

/**
 * Loss at the 1-in-`returnPeriod` rank: descending index floor(n / returnPeriod).
 * Unavailable when fewer than `returnPeriod` years were simulated.
 */
export function tailLoss(sortedDesc: readonly number[], returnPeriod: number): MetricValue {
  const n = sortedDesc.length;
  if (n < returnPeriod) return unavailable("tooFewYears");
  const value = sortedDesc[Math.floor(n / returnPeriod)];
  return value === undefined ? unavailable("tooFewYears") : available(value);
}

const UNDEFINED_METRIC_MESSAGES: Record<UnavailableReason, string> = {
  zeroExpectedLoss: "expected loss is zero",
  zeroLimit: "limit is zero",
  zeroExposure: "exposure (limit + attachment) is zero",
  zeroSpread: "layer losses have no spread",
  tooFewObservations: "fewer than 3 simulated years",
  tooFewYears: `fewer than ${TAIL_RETURN_PERIOD} simulated years`,
};

function collectWarnings(metrics: SummaryMetrics): AnalysisWarning[] {
  const warnings: AnalysisWarning[] = [];
  const checks: Array<[keyof SummaryMetrics, MetricValue]> = [
    ["coefficientOfVariation", metrics.coefficientOfVariation],
    ["elRatio", metrics.elRatio],
    ["lossCost", metrics.lossCost],
    ["skewness", metrics.skewness],
  ];
  for (const [metric, value] of checks) {
    if (value.available) continue;
    warnings.push({
      code: "UNDEFINED_METRIC",
      metric,
      message: `${metric} unavailable: ${UNDEFINED_METRIC_MESSAGES[value.reason]}.`,
    });
  }
  if (!metrics.loss1In200.available) {
    warnings.push({
      code: "UNAVAILABLE_TAIL_METRIC",
      metric: "loss1In200",
      message: `1-in-${TAIL_RETURN_PERIOD} year loss not available (need ≥ ${TAIL_RETURN_PERIOD} years, got ${metrics.sampleSize}).`,
    });
  }
  return warnings;
}

/**
 * @throws InsufficientDataError on an empty layer-loss sequence.
 */
export function computeRiskMetrics(layerLoss: LayerLoss, terms: TreatyTerms): RiskMetricsResult {
  const n = layerLoss.length;
  if (n === 0) {
    throw new InsufficientDataError("RiskMetrics: no layer losses to summarise.");
  }

  const sortedDesc = sortDescending(layerLoss);
  const expectedLoss = mean(layerLoss);
  const stdDev = sampleStdDev(layerLoss, expectedLoss);
  const skew = adjustedSkewness(layerLoss, expectedLoss);
  const payoutYears = layerLoss.reduce((count, v) => (v > 0 ? count + 1 : count), 0);
  const exposureValue = terms.limit + terms.attachment;

  const metrics: SummaryMetrics = {
    sampleSize: n,
    expectedLoss,
    stdDev,
    coefficientOfVariation: ratio(stdDev, expectedLoss, "zeroExpectedLoss"),
    payoutProbability: payoutYears / n,
    elRatio: ratio(expectedLoss, terms.limit, "zeroLimit", 100),
    suggestedPremium: expectedLoss * PREMIUM_LOADING,
    exposureValue,
    lossCost: ratio(expectedLoss, exposureValue, "zeroExposure", LOSS_COST_SCALE),
    skewness: skew !== null ? available(skew) : unavailable(n < 3 ? "tooFewObservations" : "zeroSpread"),
    maxLoss: sortedDesc[0] ?? 0,
    p95: percentileFromDescending(sortedDesc, 95),
    p99: percentileFromDescending(sortedDesc, 99),
    loss1In200: tailLoss(sortedDesc, TAIL_RETURN_PERIOD),
  };

  return { metrics, warnings: collectWarnings(metrics) };
}
