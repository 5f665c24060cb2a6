/**
 * Vertex Stage Types
 *
 * Fixed-shape records passed into and out of the point-sprite vertex stage.
 */

/** 2D vector as [x, y] tuple */
export type Vec2 = readonly [number, number];

/** RGB triple */
export type Vec3 = readonly [number, number, number];

/** Homogeneous position as [x, y, z, w] */
export type Vec4 = readonly [number, number, number, number];

/** Per-vertex input: the attribute bound at slot 0 */
export interface VertexInput {
  position: Vec2;
}

/** Everything the stage writes for one vertex */
export interface VertexOutput {
  /** Clip-space position (gl_Position) */
  clipPosition: Vec4;
  /** Rasterized point diameter in pixels (gl_PointSize) */
  pointSize: number;
  /** Color interpolant handed to the fragment stage at slot 0 */
  color: Vec3;
}
