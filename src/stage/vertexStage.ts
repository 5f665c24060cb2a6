/**
 * Point-sprite vertex stage, evaluated on the CPU.
 *
 * Mirrors `pointSpriteVertexShader` exactly so hosts can compute the values
 * the GPU will produce (hit testing, tests) without a context.
 */

import type { VertexInput, VertexOutput, Vec3 } from "./types";

/** Point diameter written to gl_PointSize */
export const POINT_SIZE = 2.0;

/** Color interpolant written for every vertex */
export const POINT_COLOR: Vec3 = [1.0, 1.0, 1.0];

/** Input slot of the position attribute */
export const POSITION_LOCATION = 0;

/** Varying carrying the color interpolant, matched to the fragment stage by name */
export const COLOR_VARYING = "v_color";

/** Bytes per float */
const FLOAT_SIZE = 4;

/**
 * Run the stage for a single vertex.
 * Places the 2D position into clip space unprojected (z = 0, w = 1).
 */
export function transformVertex(input: VertexInput): VertexOutput {
  const [x, y] = input.position;
  return {
    clipPosition: [x, y, 0.0, 1.0],
    pointSize: POINT_SIZE,
    color: [POINT_COLOR[0], POINT_COLOR[1], POINT_COLOR[2]],
  };
}

/**
 * Run the stage over every vertex of an interleaved float buffer.
 *
 * `stride` and `offset` are in bytes and follow the same rules as
 * `vertexAttribPointer`: a stride of 0 means tightly packed positions.
 *
 * @throws if stride/offset don't address whole floats, or the stride can't
 * hold the position
 */
export function transformVertices(
  data: Float32Array,
  stride: number = 0,
  offset: number = 0
): VertexOutput[] {
  const effectiveStride = stride === 0 ? 2 * FLOAT_SIZE : stride;

  if (effectiveStride % FLOAT_SIZE !== 0 || offset % FLOAT_SIZE !== 0 || offset < 0) {
    throw new Error(
      `Vertex layout must be float aligned: stride=${stride}, offset=${offset}`
    );
  }
  if (offset + 2 * FLOAT_SIZE > effectiveStride) {
    throw new Error(
      `Position attribute (8 bytes at offset ${offset}) does not fit stride ${effectiveStride}`
    );
  }

  const strideFloats = effectiveStride / FLOAT_SIZE;
  const offsetFloats = offset / FLOAT_SIZE;
  // The last vertex only needs its position inside the buffer, not a full stride
  const byteLength = data.length * FLOAT_SIZE;
  const vertexCount =
    byteLength < offset + 2 * FLOAT_SIZE
      ? 0
      : Math.floor((byteLength - offset - 2 * FLOAT_SIZE) / effectiveStride) + 1;
  const outputs: VertexOutput[] = new Array(vertexCount);

  for (let i = 0; i < vertexCount; i++) {
    const base = i * strideFloats + offsetFloats;
    outputs[i] = transformVertex({
      position: [data[base] ?? 0, data[base + 1] ?? 0],
    });
  }

  return outputs;
}
