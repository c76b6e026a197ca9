export { buildFlatnessAnimation, flatnessReadings, type FlatnessReadings } from "./flatnessAnimation";
export { createProfileBlock, type ProfileBlockOptions } from "./profileBlock";
export {
  DEFAULT_RENDER_OPTIONS,
  parseRenderArgs,
  sceneConfigFor,
  type RenderOptions,
} from "./cli";
