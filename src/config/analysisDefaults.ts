/**
 * Central defaults for treaty analysis. Pricing constants are fixed by design and
 * not exposed as request parameters.
 */

import type { TreatyTerms } from "@/domain/treaty/treaty.schema";

/** Simulated years drawn for a synthetic run. */
export const DEFAULT_SAMPLE_SIZE = 10_000;

/** Suggested premium = EL * loading (55% load). */
export const PREMIUM_LOADING = 1.55;

/** Loss cost scale: EL / exposure * 10,000 (cents per $100 of exposure). */
export const LOSS_COST_SCALE = 10_000;

/** Return period (years) of the reported tail loss; needs at least this many years. */
export const TAIL_RETURN_PERIOD = 200;

export const DEFAULT_TREATY_TERMS: TreatyTerms = {
  limit: 50_000_000,
  attachment: 20_000_000,
  deductible: 0,
};

/** Return periods (years) printed in summary reports. */
export const REPORT_RETURN_PERIODS = [10, 50, 100, 200, 250] as const;
