/**
 * Treaty layer transform (pure, elementwise).
 * layer = clamp(max(raw - deductible, 0) - attachment, 0, limit)
 */

import type { TreatyTerms } from "@/domain/treaty/treaty.schema";
import type { LayerLoss, LossSample } from "@/domain/treaty/treaty.types";

/** Layer loss for a single year. Negative (and NaN) raw losses pay nothing. */
export function layerLossFor(rawLoss: number, terms: TreatyTerms): number {
  if (Number.isNaN(rawLoss)) return 0;
  const net = Math.max(rawLoss - terms.deductible, 0);
  return Math.min(Math.max(net - terms.attachment, 0), terms.limit);
}

export function applyLayer(losses: LossSample, terms: TreatyTerms): LayerLoss {
  return losses.map((loss) => layerLossFor(loss, terms));
}
