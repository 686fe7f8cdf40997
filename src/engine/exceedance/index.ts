export { buildExceedanceCurve, lossAtReturnPeriod } from "./buildExceedanceCurve";
