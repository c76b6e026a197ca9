export { GifVideoSink, type GifSinkConfig, type OutputWriter } from "./GifVideoSink";
export {
  FfmpegVideoSink,
  type EncoderProcess,
  type FfmpegSinkConfig,
  type Spawner,
} from "./FfmpegVideoSink";
export { frameSize } from "./frames";
