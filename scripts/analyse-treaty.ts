/**
 * Command-line treaty analysis.
 * Run from repo root:
 *   npm run analyse -- --zone south --seed 42
 *   npm run analyse -- --file losses.csv --limit 50000000 --attachment 20000000 --elt elt.csv
 */

import { readFileSync, writeFileSync } from "node:fs";
import { parseArgs } from "node:util";
import { DEFAULT_TREATY_TERMS, REPORT_RETURN_PERIODS } from "../src/config/analysisDefaults";
import { LossZoneIdSchema } from "../src/domain/treaty/treaty.schema";
import { lossAtReturnPeriod } from "../src/engine/exceedance";
import { createSeededRandom, parseLossSeries } from "../src/engine/lossSample";
import { analyseTreaty } from "../src/lib/analyseTreaty";
import type { LossSource } from "../src/lib/analyseTreaty";
import { parseAmountOption, parseSampleSizeOption, parseSeedOption } from "../src/lib/cliOptions";
import { buildEventLossTable, eventLossTableToCsv } from "../src/lib/eventLossTable";
import { buildMetricRows, formatMetricValue } from "../src/lib/formatMetrics";

function buildSource(values: {
  file?: string;
  zone?: string;
  samples?: string;
  seed?: string;
}): LossSource {
  if (values.file) {
    const { losses, droppedEntries } = parseLossSeries(readFileSync(values.file));
    if (droppedEntries.length > 0) {
      console.log(`Skipped ${droppedEntries.length} non-numeric row(s) in ${values.file}.`);
    }
    return { kind: "series", losses };
  }
  const zone = LossZoneIdSchema.safeParse(values.zone ?? "all");
  if (!zone.success) {
    throw new Error(`--zone must be one of: ${LossZoneIdSchema.options.join(", ")}`);
  }
  const seed = parseSeedOption(values.seed);
  if (!seed.ok) throw new Error(seed.error);
  const samples = parseSampleSizeOption(values.samples);
  if (!samples.ok) throw new Error(samples.error);
  const random = seed.seed !== undefined ? createSeededRandom(seed.seed) : () => Math.random();
  return { kind: "synthetic", zone: zone.data, sampleSize: samples.sampleSize, random };
}

function main(): void {
  const { values } = parseArgs({
    options: {
      file: { type: "string" },
      zone: { type: "string" },
      samples: { type: "string" },
      seed: { type: "string" },
      limit: { type: "string" },
      attachment: { type: "string" },
      deductible: { type: "string" },
      elt: { type: "string" },
    },
  });

  const analysis = analyseTreaty({
    source: buildSource(values),
    terms: {
      limit: parseAmountOption(values.limit, DEFAULT_TREATY_TERMS.limit),
      attachment: parseAmountOption(values.attachment, DEFAULT_TREATY_TERMS.attachment),
      deductible: parseAmountOption(values.deductible, DEFAULT_TREATY_TERMS.deductible),
    },
  });

  for (const row of buildMetricRows(analysis.metrics)) {
    console.log(`${row.label.padEnd(32)} ${row.display}`);
  }

  console.log("\nEP curve");
  for (const years of REPORT_RETURN_PERIODS) {
    const loss = lossAtReturnPeriod(analysis.curve, years);
    console.log(`  1-in-${String(years).padEnd(5)} ${formatMetricValue(loss, "currency")}`);
  }

  for (const warning of analysis.warnings) {
    console.warn(`warning: ${warning.message}`);
  }

  if (values.elt) {
    writeFileSync(values.elt, eventLossTableToCsv(buildEventLossTable(analysis.layerLoss)) + "\n");
    console.log(`\nEvent Loss Table written to ${values.elt}`);
  }
}

try {
  main();
} catch (err) {
  const name = err instanceof Error ? err.name : "Error";
  const message = err instanceof Error ? err.message : String(err);
  console.error(`${name}: ${message}`);
  process.exitCode = 1;
}
