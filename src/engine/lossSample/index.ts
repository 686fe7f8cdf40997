export type { RandomSource } from "./random";
export { createSeededRandom, sampleGamma, sampleStandardNormal } from "./random";
export type { GenerateSyntheticLossesOptions } from "./synthetic";
export { generateSyntheticLosses } from "./synthetic";
export type { LossSeriesInput, ParseLossSeriesResult } from "./parseLossSeries";
export { parseLossSeries, toLossValue } from "./parseLossSeries";
