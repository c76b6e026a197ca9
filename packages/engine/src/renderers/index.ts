export {
  Canvas2DRasterizer,
  type Canvas2DContext,
  type Canvas2DRasterizerConfig,
  type ContextFactory,
  type ImageDataLike,
} from "./Canvas2DRasterizer";
