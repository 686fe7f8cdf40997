/**
 * Synthetic annual loss sample: N i.i.d. Gamma draws for a built-in zone.
 */

import { DEFAULT_SAMPLE_SIZE } from "@/config/analysisDefaults";
import { getLossZone } from "@/config/zones";
import type { LossZoneId } from "@/domain/treaty/treaty.schema";
import type { LossSample } from "@/domain/treaty/treaty.types";
import { dlog } from "@/lib/debug";
import { sampleGamma } from "./random";
import type { RandomSource } from "./random";

export type GenerateSyntheticLossesOptions = {
  zone: LossZoneId;
  sampleSize?: number;
  random: RandomSource;
};

export function generateSyntheticLosses(options: GenerateSyntheticLossesOptions): LossSample {
  const { zone, sampleSize = DEFAULT_SAMPLE_SIZE, random } = options;
  if (!Number.isInteger(sampleSize) || sampleSize < 1) {
    throw new RangeError(`SyntheticLosses: sampleSize must be a positive integer (got ${sampleSize}).`);
  }
  const { shape, scale } = getLossZone(zone);

  const losses: number[] = [];
  for (let i = 0; i < sampleSize; i++) {
    losses.push(sampleGamma(shape, scale, random));
  }

  dlog("[loss-sample] synthetic", { zone, sampleSize, shape, scale });
  return losses;
}
