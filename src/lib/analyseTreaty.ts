/**
 * Treaty analysis pipeline: loss sample -> layer transform -> { metrics, EP curve }.
 * One synchronous pass per request; no state survives between calls.
 */

import { getLossZone } from "@/config/zones";
import { InsufficientDataError, InvalidTreatyTermsError } from "@/domain/treaty/treaty.errors";
import { TreatyTermsSchema } from "@/domain/treaty/treaty.schema";
import type { LossZoneId, TreatyTerms } from "@/domain/treaty/treaty.schema";
import type { AnalysisWarning, LossSample, TreatyAnalysis } from "@/domain/treaty/treaty.types";
import { buildExceedanceCurve } from "@/engine/exceedance";
import { applyLayer } from "@/engine/layer";
import { generateSyntheticLosses } from "@/engine/lossSample";
import type { RandomSource } from "@/engine/lossSample";
import { computeRiskMetrics } from "@/engine/riskMetrics";
import { dlog } from "./debug";

export type LossSource =
  | { kind: "synthetic"; zone: LossZoneId; sampleSize?: number; random: RandomSource }
  | { kind: "series"; losses: LossSample };

export type AnalyseTreatyRequest = {
  source: LossSource;
  /** Validated here; callers may pass raw user input. */
  terms: unknown;
};

export function validateTreatyTerms(
  value: unknown
): { ok: true; terms: TreatyTerms } | { ok: false; issues: string[] } {
  const parsed = TreatyTermsSchema.safeParse(value);
  if (parsed.success) return { ok: true, terms: parsed.data };
  const issues = parsed.error.issues.map((issue) => {
    const field = issue.path.length > 0 ? issue.path.join(".") : "terms";
    return `${field}: ${issue.message}`;
  });
  return { ok: false, issues };
}

function resolveLosses(source: LossSource): LossSample {
  if (source.kind === "series") return source.losses;
  return generateSyntheticLosses({
    zone: source.zone,
    sampleSize: source.sampleSize,
    random: source.random,
  });
}

/**
 * @throws InvalidTreatyTermsError when terms fail validation.
 * @throws InsufficientDataError when the loss sample is empty (checked before any downstream stage).
 */
export function analyseTreaty(request: AnalyseTreatyRequest): TreatyAnalysis {
  const validation = validateTreatyTerms(request.terms);
  if (!validation.ok) {
    throw new InvalidTreatyTermsError(validation.issues);
  }
  const { terms } = validation;

  const losses = resolveLosses(request.source);
  if (losses.length === 0) {
    throw new InsufficientDataError("TreatyAnalysis: loss sample has no observations.");
  }

  const layerLoss = applyLayer(losses, terms);
  const { metrics, warnings: metricWarnings } = computeRiskMetrics(layerLoss, terms);
  const curve = buildExceedanceCurve(layerLoss);

  const warnings: AnalysisWarning[] = [];
  let zone: LossZoneId | undefined;
  if (request.source.kind === "synthetic") {
    zone = request.source.zone;
    const lossZone = getLossZone(zone);
    if (lossZone.highRisk) {
      warnings.push({
        code: "HIGH_RISK_ZONE",
        message: `${lossZone.label} is a high-risk zone with historically severe storms.`,
      });
    }
  }
  warnings.push(...metricWarnings);

  dlog("[analysis] ok", {
    sampleSize: metrics.sampleSize,
    expectedLoss: metrics.expectedLoss,
    warnings: warnings.length,
  });

  return { sampleSize: metrics.sampleSize, zone, layerLoss, metrics, curve, warnings };
}
