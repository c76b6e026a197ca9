// Logging and errors
export { Logger, getLogLevel, setLogLevel, type LogLevel } from "./logger";
export * from "./errors";

// Geometry kernel
export * from "./geometry";

// Scene graph
export * from "./graph";

// Shapes
export * from "./shapes";

// Compositing
export {
  blendInto,
  cloneFrameBuffer,
  createFrameBuffer,
  pixelAt,
  toPixel,
} from "./compositing/frameBuffer";

// Timeline
export { Scene, DEFAULT_SCENE_CONFIG } from "./timeline/Scene";
export { applyInstruction, formatInstruction, type SceneInstruction } from "./timeline/instructions";
export * from "./animation/builders";

// Renderers
export * from "./renderers";
