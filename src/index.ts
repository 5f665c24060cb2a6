/**
 * Point sprites - a WebGL2 particle field drawn through a fixed point-sprite vertex stage
 */

export const VERSION = "0.1.0";

export { PointSprites } from "./PointSprites";
export {
  resolveOptions,
  type PointSpritesOptions,
  type ResolvedOptions,
  type ClearColor,
} from "./options";
export { PointSpriteRenderer, assertPointSizeSupported } from "./PointSpriteRenderer";
export { Buffer, type BufferUsage } from "./Buffer";
export {
  compileShader,
  createProgram,
  assertAttributeLocation,
  type AttributeLocations,
} from "./shaders/compile";
export {
  pointSpriteVertexShader,
  pointSpriteFragmentShader,
} from "./shaders/pointSprite";

export * from "./stage/index";
export * from "./particles/index";
