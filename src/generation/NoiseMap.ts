import alea from "alea";
import { createNoise2D, type NoiseFunction2D } from "simplex-noise";

export interface NoiseMapOptions {
  frequency: number;
  octaves: number;
  lacunarity: number;
  persistence: number;
}

const DEFAULTS: NoiseMapOptions = {
  frequency: 0.02,
  octaves: 4,
  lacunarity: 2.0,
  persistence: 0.5,
};

/**
 * Multi-octave simplex noise over the horizontal plane.
 * sample(x, z) returns a value in [0, 1].
 */
export class NoiseMap {
  private readonly noise: NoiseFunction2D;
  private readonly opts: NoiseMapOptions;

  constructor(seed: string, options?: Partial<NoiseMapOptions>) {
    this.opts = { ...DEFAULTS, ...options };
    this.noise = createNoise2D(alea(seed));
  }

  /** Sample noise at block coordinates. Returns [0, 1]. */
  sample(x: number, z: number): number {
    let value = 0;
    let amplitude = 1;
    let freq = this.opts.frequency;
    let maxAmplitude = 0;

    for (let i = 0; i < this.opts.octaves; i++) {
      value += this.noise(x * freq, z * freq) * amplitude;
      maxAmplitude += amplitude;
      amplitude *= this.opts.persistence;
      freq *= this.opts.lacunarity;
    }

    return Math.min(1, Math.max(0, (value / maxAmplitude + 1) / 2));
  }

  /** Integer in [min, max] from the noise value at (x, z). */
  range(x: number, z: number, min: number, max: number): number {
    return min + Math.round(this.sample(x, z) * (max - min));
  }
}
