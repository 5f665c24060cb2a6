/**
 * PointSprites - renders a seeded particle field as white point sprites
 */

import { PointSpriteRenderer } from "./PointSpriteRenderer";
import { createParticles } from "./particles/ParticleField";
import { SeededRNG } from "./particles/rng";
import {
  resolveOptions,
  type ClearColor,
  type PointSpritesOptions,
} from "./options";

export class PointSprites {
  readonly canvas: HTMLCanvasElement;
  readonly gl: WebGL2RenderingContext;

  private renderer: PointSpriteRenderer;
  private clearColor: ClearColor;
  private debug: boolean;

  private animationId: number | null = null;
  private needsRender = true;

  constructor(options: PointSpritesOptions) {
    const resolved = resolveOptions(options);
    this.canvas = resolved.canvas;
    this.clearColor = resolved.clearColor;
    this.debug = resolved.debug;

    const gl = this.canvas.getContext("webgl2", {
      depth: false,
      antialias: false,
    });
    if (!gl) {
      throw new Error("WebGL2 not supported");
    }
    this.gl = gl;

    this.renderer = new PointSpriteRenderer(gl);
    this.renderer.setParticles(
      createParticles(resolved.particleCount, new SeededRNG(resolved.seed))
    );

    this.resize();
  }

  /** Replace the particle field */
  setParticles(data: Float32Array): void {
    this.renderer.setParticles(data);
    this.requestRender();
  }

  /** Number of point sprites drawn per frame */
  getParticleCount(): number {
    return this.renderer.getVertexCount();
  }

  /** Resize the canvas to match display size */
  resize(): void {
    const dpr = globalThis.devicePixelRatio || 1;
    const width = Math.floor(this.canvas.clientWidth * dpr);
    const height = Math.floor(this.canvas.clientHeight * dpr);

    if (this.canvas.width !== width || this.canvas.height !== height) {
      this.canvas.width = width;
      this.canvas.height = height;
      this.gl.viewport(0, 0, width, height);
      this.requestRender();
    }
  }

  /** Request a render on the next frame */
  requestRender(): void {
    this.needsRender = true;
  }

  private frameCount = 0;
  private lastDebugTime = 0;

  /** Render a single frame */
  render(): void {
    const gl = this.gl;
    const [r, g, b, a] = this.clearColor;

    gl.clearColor(r, g, b, a);
    gl.clear(gl.COLOR_BUFFER_BIT);

    this.renderer.render();

    this.frameCount++;
    if (this.debug) {
      const now = Date.now();
      if (now - this.lastDebugTime > 1000) {
        console.log(
          `[PointSprites] frame=${this.frameCount}, vertices=${this.renderer.getVertexCount()}, ` +
          `viewport=${this.canvas.width}x${this.canvas.height}`
        );
        this.lastDebugTime = now;
      }
    }
  }

  /** Start the render loop */
  start(): void {
    if (this.animationId !== null) return;

    const loop = () => {
      this.resize();
      if (this.needsRender) {
        this.needsRender = false;
        this.render();
      }
      this.animationId = requestAnimationFrame(loop);
    };

    this.animationId = requestAnimationFrame(loop);
  }

  /** Stop the render loop */
  stop(): void {
    if (this.animationId !== null) {
      cancelAnimationFrame(this.animationId);
      this.animationId = null;
    }
  }

  /** Stop rendering and release GPU resources */
  destroy(): void {
    this.stop();
    this.renderer.destroy();
  }
}
