export * from "./factories";
export { endArrowVertices, fractionalVertices, leaderLength, startArrowVertices } from "./leader";
export type { LeaderGeometry } from "./leader";
export { contourSamples, jaggedPoints } from "./contourNodes";
export { globalAxis } from "./drawNode";
export { createDialIndicator, type DialOptions } from "./dial/createDialIndicator";
export { DialIndicator, trackInstruction } from "./dial/DialIndicator";
