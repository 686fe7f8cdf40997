/**
 * Display formatting for SummaryMetrics: currency to 2 decimals, percentages to 1–2,
 * and an explicit "Not available" for metrics that are undefined for this sample.
 */

import type { MetricValue, SummaryMetrics } from "@/domain/treaty/treaty.types";

export const NOT_AVAILABLE = "Not available";

export type MetricFormat = "currency" | "percent1" | "percent2" | "number2" | "integer";

export type MetricRow = {
  key: keyof SummaryMetrics;
  label: string;
  display: string;
};

const currencyFormatter = new Intl.NumberFormat("en-US", {
  style: "currency",
  currency: "USD",
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

const integerFormatter = new Intl.NumberFormat("en-US", { maximumFractionDigits: 0 });

export function formatCurrency(value: number): string {
  return currencyFormatter.format(value);
}

/** Value is already in percent units (50 -> "50.0%"). */
export function formatPercent(value: number, digits = 1): string {
  return `${value.toFixed(digits)}%`;
}

export function formatNumber(value: number, format: MetricFormat): string {
  switch (format) {
    case "currency":
      return formatCurrency(value);
    case "percent1":
      return formatPercent(value, 1);
    case "percent2":
      return formatPercent(value, 2);
    case "number2":
      return value.toFixed(2);
    case "integer":
      return integerFormatter.format(value);
  }
}

export function formatMetricValue(value: MetricValue, format: MetricFormat): string {
  return value.available ? formatNumber(value.value, format) : NOT_AVAILABLE;
}

type RowSpec = {
  key: keyof SummaryMetrics;
  label: string;
  format: MetricFormat;
  /** Multiplier applied before formatting (payout probability is stored 0–1). */
  scale?: number;
};

const ROW_SPECS: RowSpec[] = [
  { key: "sampleSize", label: "Simulated Years", format: "integer" },
  { key: "expectedLoss", label: "Expected Loss (EL / AAL)", format: "currency" },
  { key: "suggestedPremium", label: "Suggested Premium", format: "currency" },
  { key: "payoutProbability", label: "Chance of Payout in Year", format: "percent1", scale: 100 },
  { key: "elRatio", label: "EL / Limit %", format: "percent2" },
  { key: "stdDev", label: "Standard Deviation", format: "currency" },
  { key: "coefficientOfVariation", label: "Coefficient of Variation", format: "number2" },
  { key: "skewness", label: "Skewness", format: "number2" },
  { key: "exposureValue", label: "Exposure (Limit + Attachment)", format: "currency" },
  { key: "lossCost", label: "Loss Cost (per $100 Exposure)", format: "number2" },
  { key: "p95", label: "95th Percentile Loss", format: "currency" },
  { key: "p99", label: "99th Percentile Loss", format: "currency" },
  { key: "maxLoss", label: "Maximum Loss", format: "currency" },
  { key: "loss1In200", label: "1-in-200 Year Loss", format: "currency" },
];

/** Labelled display rows in report order. */
export function buildMetricRows(metrics: SummaryMetrics): MetricRow[] {
  return ROW_SPECS.map(({ key, label, format, scale = 1 }) => {
    const value = metrics[key];
    const display =
      typeof value === "number"
        ? formatNumber(value * scale, format)
        : formatMetricValue(value.available ? { available: true, value: value.value * scale } : value, format);
    return { key, label, display };
  });
}
