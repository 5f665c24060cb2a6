/**
 * Point Sprite Renderer
 *
 * Draws an interleaved particle buffer as a POINTS primitive through the
 * point-sprite vertex stage. All pipeline checks happen in the constructor;
 * render() cannot fail.
 */

import { Buffer } from "./Buffer";
import { createProgram, assertAttributeLocation } from "./shaders/compile";
import {
  pointSpriteVertexShader,
  pointSpriteFragmentShader,
} from "./shaders/pointSprite";
import { POINT_SIZE, POSITION_LOCATION } from "./stage/vertexStage";
import {
  particleCount,
  PARTICLE_STRIDE,
  POSITION_OFFSET,
} from "./particles/ParticleField";

const POSITION_ATTRIBUTE = "a_position";

export class PointSpriteRenderer {
  readonly gl: WebGL2RenderingContext;

  private program: WebGLProgram;
  private vao: WebGLVertexArrayObject;
  private vertexBuffer: Buffer;
  private vertexCount = 0;
  private _destroyed = false;

  constructor(gl: WebGL2RenderingContext) {
    this.gl = gl;

    assertPointSizeSupported(gl, POINT_SIZE);

    this.program = createProgram(gl, pointSpriteVertexShader, pointSpriteFragmentShader, {
      [POSITION_ATTRIBUTE]: POSITION_LOCATION,
    });

    let vao: WebGLVertexArrayObject | null = null;
    try {
      assertAttributeLocation(gl, this.program, POSITION_ATTRIBUTE, POSITION_LOCATION);

      vao = gl.createVertexArray();
      if (!vao) {
        throw new Error("Failed to create vertex array");
      }
      this.vao = vao;
      this.vertexBuffer = new Buffer(gl, "dynamic");
    } catch (err) {
      if (vao) gl.deleteVertexArray(vao);
      gl.deleteProgram(this.program);
      throw err;
    }

    this.setupVAO();
  }

  private setupVAO(): void {
    const gl = this.gl;

    gl.bindVertexArray(this.vao);

    // a_position (location 0) - 2 floats per particle, velocity skipped by the stride
    this.vertexBuffer.bind();
    gl.enableVertexAttribArray(POSITION_LOCATION);
    gl.vertexAttribPointer(
      POSITION_LOCATION,
      2,
      gl.FLOAT,
      false,
      PARTICLE_STRIDE,
      POSITION_OFFSET
    );

    gl.bindVertexArray(null);
    this.vertexBuffer.unbind();
  }

  /**
   * Upload an interleaved particle buffer ([x, y, vx, vy] per particle).
   * @throws if the buffer is not a whole number of particles
   */
  setParticles(data: Float32Array): void {
    if (this._destroyed) return;

    const count = particleCount(data);
    this.vertexBuffer.setData(data);
    this.vertexBuffer.unbind();
    this.vertexCount = count;
  }

  /** Draw every uploaded particle as a point sprite */
  render(): void {
    if (this._destroyed || this.vertexCount === 0) return;

    const gl = this.gl;

    gl.useProgram(this.program);
    gl.bindVertexArray(this.vao);
    gl.drawArrays(gl.POINTS, 0, this.vertexCount);
    gl.bindVertexArray(null);
  }

  /** Number of vertices drawn per render() */
  getVertexCount(): number {
    return this.vertexCount;
  }

  /** Release GPU resources */
  destroy(): void {
    if (this._destroyed) return;

    this.vertexBuffer.destroy();
    this.gl.deleteVertexArray(this.vao);
    this.gl.deleteProgram(this.program);
    this.vertexCount = 0;
    this._destroyed = true;
  }

  get destroyed(): boolean {
    return this._destroyed;
  }
}

/**
 * Throw unless the context can rasterize points of `size` pixels.
 * gl_PointSize is clamped silently outside this range, so catch it up front.
 */
export function assertPointSizeSupported(
  gl: WebGL2RenderingContext,
  size: number
): void {
  const range: unknown = gl.getParameter(gl.ALIASED_POINT_SIZE_RANGE);
  if (!(range instanceof Float32Array) || range.length < 2) {
    throw new Error("Point size range unavailable");
  }
  const min = range[0] ?? 0;
  const max = range[1] ?? 0;
  if (size < min || size > max) {
    throw new Error(
      `Point size ${size} is outside the supported range [${min}, ${max}]`
    );
  }
}
