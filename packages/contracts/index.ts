export * from "./core/time";
export * from "./core/vectors";

export * from "./style/colors";

// Node attributes and kinds
export * from "./scene/attributes";
export * from "./scene/nodes";

// Timeline instructions (replayed by the engine)
export * from "./scene/instructions";

export * from "./geometry/geometry";

export * from "./raster/raster";

export * from "./io/io";

export * from "./config/scene";
