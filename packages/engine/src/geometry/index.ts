export { createRng, type Rng } from "./random";
export { interpolate, linspace, profileShape } from "./interpolate";
export { minZoneFlatness, minZoneFlatnessTrace } from "./flatness";
export { rayPolygonDistance, type PlanarPoint } from "./rayPolygon";
export {
  circlePath,
  concatSamples,
  jaggedSamples,
  offsetAlongNormals,
  sampleContour,
} from "./contours";
export { isConvex, signedArea } from "./polygons";
export {
  generateFlatnessProfile,
  DEFAULT_FLATNESS_PROFILE,
  type FlatnessProfileOptions,
} from "./flatnessProfile";
