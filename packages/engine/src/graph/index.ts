export { SceneGraph, type GlobalTransform, type NodeRecord } from "./SceneGraph";
export { SceneNode, type Attachable, type MoveOptions } from "./SceneNode";
export { MAX_EXTENSIONS, kindDefaults } from "./schema";
