import type { MetricValue, UnavailableReason } from "./treaty.types";

export const available = (value: number): MetricValue => ({ available: true, value });

export const unavailable = (reason: UnavailableReason): MetricValue => ({ available: false, reason });
