/**
 * Particle field
 */

export {
  createParticles,
  particleCount,
  readParticle,
  PARTICLE_FLOATS,
  PARTICLE_STRIDE,
  POSITION_OFFSET,
  VELOCITY_OFFSET,
} from "./ParticleField";
export { SeededRNG } from "./rng";
export type { Particle, RandomSource } from "./types";
