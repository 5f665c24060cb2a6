/**
 * Application options and their defaults
 */

/** RGBA clear color (0-1 values) */
export type ClearColor = readonly [number, number, number, number];

export interface PointSpritesOptions {
  canvas: HTMLCanvasElement;
  /** Number of particles to scatter (default: 10000) */
  particleCount?: number;
  /** Seed for particle placement (default: 1) */
  seed?: number;
  /** Background color (default: opaque black) */
  clearColor?: ClearColor;
  /** Log a frame summary once per second (default: false) */
  debug?: boolean;
}

export type ResolvedOptions = Required<PointSpritesOptions>;

export const DEFAULT_PARTICLE_COUNT = 10000;
export const DEFAULT_SEED = 1;
export const DEFAULT_CLEAR_COLOR: ClearColor = [0, 0, 0, 1];

/** Fill in defaults and validate */
export function resolveOptions(options: PointSpritesOptions): ResolvedOptions {
  const particleCount = options.particleCount ?? DEFAULT_PARTICLE_COUNT;
  if (!Number.isInteger(particleCount) || particleCount < 0) {
    throw new Error(
      `particleCount must be a non-negative integer, got ${particleCount}`
    );
  }

  const clearColor = options.clearColor ?? DEFAULT_CLEAR_COLOR;
  for (const channel of clearColor) {
    if (!(channel >= 0 && channel <= 1)) {
      throw new Error(
        `clearColor channels must be in [0, 1], got [${clearColor.join(", ")}]`
      );
    }
  }

  return {
    canvas: options.canvas,
    particleCount,
    seed: options.seed ?? DEFAULT_SEED,
    clearColor,
    debug: options.debug ?? false,
  };
}
