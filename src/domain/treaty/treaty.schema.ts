import { z } from "zod";

/**
 * Monetary amounts (USD): finite and never negative.
 */
export const MoneySchema = z.number().finite().nonnegative();

/**
 * Treaty layer terms. No ordering is enforced between the three amounts:
 * an attachment below the deductible is allowed and simply erodes the layer.
 */
export const TreatyTermsSchema = z.object({
  deductible: MoneySchema,
  attachment: MoneySchema,
  limit: MoneySchema,
});
export type TreatyTerms = z.infer<typeof TreatyTermsSchema>;

/** Synthetic risk tiers (built-in Gamma severity per tier). */
export const LossZoneIdSchema = z.enum(["south", "central", "north", "all"]);
export type LossZoneId = z.infer<typeof LossZoneIdSchema>;

export const LossZoneSchema = z.object({
  id: LossZoneIdSchema,
  label: z.string().min(1),
  /** Gamma shape (k). */
  shape: z.number().positive(),
  /** Gamma scale (theta), USD. */
  scale: z.number().positive(),
  /** Tier with historically severe storms; surfaced as a report warning. */
  highRisk: z.boolean(),
});
export type LossZone = z.infer<typeof LossZoneSchema>;
