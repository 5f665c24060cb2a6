import type { Vec2 } from "../stage/types";

/** One simulated particle as stored in the vertex buffer */
export interface Particle {
  /** Clip-space position, read by the vertex stage */
  position: Vec2;
  /** Clip-space units per second; carried in the buffer, unused when drawing */
  velocity: Vec2;
}

/** Source of uniform values in [0, 1) */
export interface RandomSource {
  random(): number;
}
