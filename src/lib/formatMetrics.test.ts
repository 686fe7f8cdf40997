import { describe, it } from "node:test";
import assert from "node:assert";
import { computeRiskMetrics } from "@/engine/riskMetrics";
import {
  NOT_AVAILABLE,
  buildMetricRows,
  formatCurrency,
  formatMetricValue,
  formatPercent,
} from "./formatMetrics";

describe("formatMetrics", () => {
  it("formats currency with two decimals", () => {
    assert.strictEqual(formatCurrency(12_500_000), "$12,500,000.00");
    assert.strictEqual(formatCurrency(0), "$0.00");
  });

  it("formats percentages already in percent units", () => {
    assert.strictEqual(formatPercent(50), "50.0%");
    assert.strictEqual(formatPercent(25, 2), "25.00%");
  });

  it("renders unavailable metrics distinctly from zero", () => {
    assert.strictEqual(formatMetricValue({ available: false, reason: "tooFewYears" }, "currency"), NOT_AVAILABLE);
    assert.strictEqual(formatMetricValue({ available: true, value: 0 }, "currency"), "$0.00");
  });

  it("builds report rows", () => {
    const { metrics } = computeRiskMetrics([0, 0, 10_000_000, 40_000_000], {
      deductible: 0,
      attachment: 20_000_000,
      limit: 50_000_000,
    });
    const display = Object.fromEntries(buildMetricRows(metrics).map((r) => [r.key, r.display]));
    assert.strictEqual(display.sampleSize, "4");
    assert.strictEqual(display.expectedLoss, "$12,500,000.00");
    assert.strictEqual(display.suggestedPremium, "$19,375,000.00");
    assert.strictEqual(display.payoutProbability, "50.0%");
    assert.strictEqual(display.elRatio, "25.00%");
    assert.strictEqual(display.coefficientOfVariation, "1.51");
    assert.strictEqual(display.exposureValue, "$70,000,000.00");
    assert.strictEqual(display.lossCost, "1785.71");
    assert.strictEqual(display.maxLoss, "$40,000,000.00");
    assert.strictEqual(display.loss1In200, NOT_AVAILABLE);
  });
});
