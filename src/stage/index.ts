/**
 * Point-sprite vertex stage
 */

export {
  transformVertex,
  transformVertices,
  POINT_SIZE,
  POINT_COLOR,
  POSITION_LOCATION,
  COLOR_VARYING,
} from "./vertexStage";

export type { Vec2, Vec3, Vec4, VertexInput, VertexOutput } from "./types";
