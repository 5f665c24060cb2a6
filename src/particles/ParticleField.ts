/**
 * Particle buffer layout and initialization.
 *
 * Particles are interleaved as [x, y, vx, vy] so the same Float32Array can be
 * uploaded as a vertex buffer: the vertex stage reads the position from
 * offset 0 with a 16-byte stride and skips the velocity.
 */

import type { Particle, RandomSource } from "./types";

/** Bytes per float */
const FLOAT_SIZE = 4;

/** Floats per particle: x, y, vx, vy */
export const PARTICLE_FLOATS = 4;

/**
 * Bytes between consecutive particles.
 * The velocity half is reserved for a simulation step; drawing never reads it.
 */
export const PARTICLE_STRIDE = PARTICLE_FLOATS * FLOAT_SIZE;

/** Byte offset of the position within a particle */
export const POSITION_OFFSET = 0;

/** Byte offset of the velocity within a particle */
export const VELOCITY_OFFSET = 2 * FLOAT_SIZE;

/** Initial speed bound per axis */
const MAX_INITIAL_SPEED = 0.1;

/**
 * Create `count` particles scattered uniformly over clip space.
 * Positions fall in [-1, 1), velocities in [-0.1, 0.1) per axis.
 */
export function createParticles(count: number, rng: RandomSource): Float32Array {
  if (!Number.isInteger(count) || count < 0) {
    throw new Error(`Particle count must be a non-negative integer, got ${count}`);
  }

  const data = new Float32Array(count * PARTICLE_FLOATS);
  for (let i = 0; i < count; i++) {
    const offset = i * PARTICLE_FLOATS;
    data[offset + 0] = rng.random() * 2 - 1;
    data[offset + 1] = rng.random() * 2 - 1;
    data[offset + 2] = (rng.random() * 2 - 1) * MAX_INITIAL_SPEED;
    data[offset + 3] = (rng.random() * 2 - 1) * MAX_INITIAL_SPEED;
  }
  return data;
}

/**
 * Number of particles held by an interleaved buffer.
 * @throws if the buffer does not hold a whole number of particles
 */
export function particleCount(data: Float32Array): number {
  if (data.length % PARTICLE_FLOATS !== 0) {
    throw new Error(
      `Particle buffer length ${data.length} is not a multiple of ${PARTICLE_FLOATS}`
    );
  }
  return data.length / PARTICLE_FLOATS;
}

/** Read one particle back out of an interleaved buffer */
export function readParticle(data: Float32Array, index: number): Particle {
  if (index < 0 || index >= particleCount(data)) {
    throw new RangeError(`Particle index ${index} out of range`);
  }
  const offset = index * PARTICLE_FLOATS;
  return {
    position: [data[offset] ?? 0, data[offset + 1] ?? 0],
    velocity: [data[offset + 2] ?? 0, data[offset + 3] ?? 0],
  };
}
