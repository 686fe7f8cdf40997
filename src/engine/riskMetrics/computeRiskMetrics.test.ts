import { describe, it } from "node:test";
import assert from "node:assert";
import { InsufficientDataError } from "@/domain/treaty/treaty.errors";
import type { TreatyTerms } from "@/domain/treaty/treaty.schema";
import type { MetricValue } from "@/domain/treaty/treaty.types";
import { applyLayer } from "@/engine/layer";
import { createSeededRandom, generateSyntheticLosses } from "@/engine/lossSample";
import { computeRiskMetrics, tailLoss } from "./computeRiskMetrics";

const TERMS: TreatyTerms = { deductible: 0, attachment: 20_000_000, limit: 50_000_000 };

function assertClose(actual: number, expected: number, tolerance = 1e-6): void {
  assert(Math.abs(actual - expected) <= tolerance, `expected ≈ ${expected}, got ${actual}`);
}

function valueOf(metric: MetricValue): number {
  assert(metric.available, "metric should be available");
  return metric.value;
}

/** 1..n, any order; used where the exact tail rank matters. */
const ramp = (n: number) => Array.from({ length: n }, (_, i) => i + 1);

describe("computeRiskMetrics", () => {
  it("summarises a four-year layer", () => {
    const { metrics, warnings } = computeRiskMetrics([0, 0, 10_000_000, 40_000_000], TERMS);
    assert.strictEqual(metrics.sampleSize, 4);
    assert.strictEqual(metrics.expectedLoss, 12_500_000);
    assert.strictEqual(metrics.payoutProbability, 0.5);
    assert.strictEqual(metrics.maxLoss, 40_000_000);
    assert.strictEqual(metrics.exposureValue, 70_000_000);
    assertClose(metrics.suggestedPremium, 19_375_000);
    assertClose(metrics.stdDev, 18929694.48600091);
    assertClose(valueOf(metrics.coefficientOfVariation), 1.514375558880073, 1e-12);
    assert.strictEqual(valueOf(metrics.elRatio), 25);
    assertClose(valueOf(metrics.lossCost), 1785.7142857142858, 1e-9);
    assertClose(valueOf(metrics.skewness), 1.658523800287803, 1e-12);
    assertClose(metrics.p95, 35_500_000);
    assertClose(metrics.p99, 39_100_000);
    assert.deepStrictEqual(metrics.loss1In200, { available: false, reason: "tooFewYears" });
    assert.deepStrictEqual(
      warnings.map((w) => [w.code, w.metric]),
      [["UNAVAILABLE_TAIL_METRIC", "loss1In200"]]
    );
  });

  it("all-zero losses leave CV undefined without failing the report", () => {
    const terms: TreatyTerms = { deductible: 0, attachment: 0, limit: 10_000_000 };
    const { metrics, warnings } = computeRiskMetrics(new Array<number>(100).fill(0), terms);
    assert.strictEqual(metrics.expectedLoss, 0);
    assert.strictEqual(metrics.payoutProbability, 0);
    assert.strictEqual(metrics.maxLoss, 0);
    assert.deepStrictEqual(metrics.coefficientOfVariation, { available: false, reason: "zeroExpectedLoss" });
    assert.deepStrictEqual(metrics.skewness, { available: false, reason: "zeroSpread" });
    assert.deepStrictEqual(metrics.elRatio, { available: true, value: 0 });
    assert.deepStrictEqual(metrics.lossCost, { available: true, value: 0 });
    assert.deepStrictEqual(
      warnings.map((w) => [w.code, w.metric]),
      [
        ["UNDEFINED_METRIC", "coefficientOfVariation"],
        ["UNDEFINED_METRIC", "skewness"],
        ["UNAVAILABLE_TAIL_METRIC", "loss1In200"],
      ]
    );
  });

  it("zero limit leaves EL ratio undefined; zero exposure leaves loss cost undefined", () => {
    const withAttachment = computeRiskMetrics([0, 0, 0], { deductible: 0, attachment: 5_000_000, limit: 0 });
    assert.deepStrictEqual(withAttachment.metrics.elRatio, { available: false, reason: "zeroLimit" });
    assert.deepStrictEqual(withAttachment.metrics.lossCost, { available: true, value: 0 });

    const bare = computeRiskMetrics([0, 0, 0], { deductible: 0, attachment: 0, limit: 0 });
    assert.deepStrictEqual(bare.metrics.lossCost, { available: false, reason: "zeroExposure" });
  });

  it("a single year has zero spread and no skewness", () => {
    const { metrics } = computeRiskMetrics([5_000_000], TERMS);
    assert.strictEqual(metrics.stdDev, 0);
    assert.deepStrictEqual(metrics.skewness, { available: false, reason: "tooFewObservations" });
    assert.strictEqual(metrics.p95, 5_000_000);
    assert.strictEqual(metrics.p99, 5_000_000);
  });

  it("1-in-200 loss is present iff at least 200 years", () => {
    assert.deepStrictEqual(computeRiskMetrics(ramp(199), TERMS).metrics.loss1In200, {
      available: false,
      reason: "tooFewYears",
    });
    assert.deepStrictEqual(computeRiskMetrics(ramp(200), TERMS).metrics.loss1In200, { available: true, value: 199 });
    assert.deepStrictEqual(computeRiskMetrics(ramp(450), TERMS).metrics.loss1In200, { available: true, value: 448 });
    assert.deepStrictEqual(computeRiskMetrics(ramp(1000).reverse(), TERMS).metrics.loss1In200, {
      available: true,
      value: 995,
    });
  });

  it("tailLoss reads descending rank floor(n / returnPeriod)", () => {
    assert.deepStrictEqual(tailLoss([50, 40, 30, 20, 10], 2), { available: true, value: 30 });
    assert.deepStrictEqual(tailLoss([50], 2), { available: false, reason: "tooFewYears" });
  });

  it("payout probability stays within [0, 1]", () => {
    const losses = generateSyntheticLosses({ zone: "all", sampleSize: 1_000, random: createSeededRandom(9) });
    for (const terms of [TERMS, { deductible: 0, attachment: 0, limit: 1e9 }, { deductible: 0, attachment: 1e10, limit: 1e6 }]) {
      const { payoutProbability } = computeRiskMetrics(applyLayer(losses, terms), terms).metrics;
      assert(payoutProbability >= 0 && payoutProbability <= 1, `got ${payoutProbability}`);
    }
  });

  it("raising the limit never lowers expected loss", () => {
    const losses = generateSyntheticLosses({ zone: "south", sampleSize: 2_000, random: createSeededRandom(21) });
    let previous = -1;
    for (const limit of [1e6, 1e7, 5e7, 1e8]) {
      const terms = { ...TERMS, limit };
      const { expectedLoss } = computeRiskMetrics(applyLayer(losses, terms), terms).metrics;
      assert(expectedLoss >= previous, `limit ${limit}`);
      previous = expectedLoss;
    }
  });

  it("rejects an empty layer", () => {
    assert.throws(() => computeRiskMetrics([], TERMS), InsufficientDataError);
  });
});
