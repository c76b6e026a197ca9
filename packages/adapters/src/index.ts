export * from "./csv";
export * from "./video";
export { PointDataError, VideoSinkError } from "./errors";
