export { applyLayer, layerLossFor } from "./applyLayer";
