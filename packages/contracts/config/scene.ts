import type { Fps } from "../core/time";
import type { ColorRGB } from "../style/colors";

export interface SceneConfig {
  /** Frame width in pixels */
  width?: number;
  /** Frame height in pixels */
  height?: number;
  /** Pixels per millimetre of scene space */
  resolution?: number;
  fps?: Fps;
  background?: ColorRGB;
}
