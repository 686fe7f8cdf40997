export type { RiskMetricsResult } from "./computeRiskMetrics";
export { computeRiskMetrics, tailLoss } from "./computeRiskMetrics";
export { adjustedSkewness, mean, percentileFromDescending, sampleStdDev, sortDescending } from "./statistics";
