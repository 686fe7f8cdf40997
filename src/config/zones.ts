/**
 * Built-in synthetic loss tiers: Gamma(shape, scale) annual severity per zone.
 */

import { LossZoneSchema } from "@/domain/treaty/treaty.schema";
import type { LossZone, LossZoneId } from "@/domain/treaty/treaty.schema";

const ZONE_TABLE: Record<LossZoneId, LossZone> = {
  south: { id: "south", label: "South Florida (Zone A)", shape: 2.2, scale: 1.2e7, highRisk: true },
  central: { id: "central", label: "Central Florida (Zone B)", shape: 1.8, scale: 1.0e7, highRisk: false },
  north: { id: "north", label: "North Florida (Zone C)", shape: 1.5, scale: 8.0e6, highRisk: false },
  all: { id: "all", label: "All Zones (aggregate)", shape: 2.0, scale: 1.1e7, highRisk: false },
};

export const LOSS_ZONES: readonly LossZone[] = Object.values(ZONE_TABLE).map((z) => LossZoneSchema.parse(z));

const ZONES_BY_ID = new Map<LossZoneId, LossZone>(LOSS_ZONES.map((z) => [z.id, z]));

/** Validated zone entry (the same object listed in LOSS_ZONES). */
export function getLossZone(id: LossZoneId): LossZone {
  const zone = ZONES_BY_ID.get(id);
  if (!zone) {
    throw new Error(`LossZones: no zone configured for "${id}".`);
  }
  return zone;
}
