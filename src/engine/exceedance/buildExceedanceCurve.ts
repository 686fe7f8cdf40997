/**
 * Empirical exceedance-probability (EP) curve (pure, deterministic).
 * Rank i (0-based) of the descending-sorted layer losses gets return period N / (i + 1).
 */

import { available, unavailable } from "@/domain/treaty/metricValue";
import { InsufficientDataError } from "@/domain/treaty/treaty.errors";
import type { ExceedanceCurve, LayerLoss, MetricValue } from "@/domain/treaty/treaty.types";
import { sortDescending } from "@/engine/riskMetrics/statistics";

/**
 * Full N-point curve, no downsampling. Ties keep input order, so return periods are
 * stable for a fixed input.
 * @throws InsufficientDataError on an empty layer-loss sequence.
 */
export function buildExceedanceCurve(layerLoss: LayerLoss): ExceedanceCurve {
  const n = layerLoss.length;
  if (n === 0) {
    throw new InsufficientDataError("ExceedanceCurve: no layer losses to rank.");
  }
  return sortDescending(layerLoss).map((loss, i) => ({ returnPeriod: n / (i + 1), loss }));
}

/**
 * Loss read off the curve at a return period: the first point (largest loss first)
 * whose return period falls below the requested one. This is descending rank
 * floor(N / years), the same rank the 1-in-200 metric uses.
 */
export function lossAtReturnPeriod(curve: ExceedanceCurve, years: number): MetricValue {
  const longest = curve[0]?.returnPeriod ?? 0;
  if (years > longest) return unavailable("tooFewYears");
  const point = curve.find((p) => p.returnPeriod < years);
  return point ? available(point.loss) : unavailable("tooFewYears");
}
