import type { Randomizer } from '@faker-js/faker';

/**
 * 32-bit FNV-1a hash of a string over UTF-16 code units.
 * offset-basis: 2166136261, prime: 16777619, modulo 2^32
 */
export function fnv1a32(s: string): number {
  let x = 2166136261 >>> 0;
  for (let i = 0; i < s.length; i++) {
    x ^= s.charCodeAt(i);
    x = Math.imul(x, 16777619) >>> 0;
  }
  return x >>> 0;
}

// xorshift never leaves the all-zero state, so that state is remapped
const ZERO_STATE_REPLACEMENT = 0x9e3779b9;

function initialState(seed: number, stream: string): number {
  const x = ((seed >>> 0) ^ fnv1a32(stream)) >>> 0;
  return x === 0 ? ZERO_STATE_REPLACEMENT : x;
}

function foldSeed(seed: number | number[]): number {
  if (!Array.isArray(seed)) return seed;
  return seed.reduce((acc, part) => (Math.imul(acc, 31) + (part >>> 0)) >>> 0, 0);
}

/**
 * xorshift32 RNG with uint32 state, usable as a faker Randomizer.
 *
 * Initialization: x = (seed >>> 0) ^ fnv1a32(stream)
 * Step: x ^= x << 13; x ^= x >>> 17; x ^= x << 5; (all masked to uint32)
 *
 * `stream` separates sequences that share a seed. Only the low 32 bits of
 * the seed are significant.
 */
export class XorShift32 implements Randomizer {
  private x: number;

  constructor(
    seed: number,
    private readonly stream: string = ''
  ) {
    this.x = initialState(seed, stream);
  }

  /** Returns the next uint32 value. */
  nextUint32(): number {
    let x = this.x >>> 0;
    x ^= (x << 13) >>> 0;
    x ^= x >>> 17;
    x ^= (x << 5) >>> 0;
    this.x = x >>> 0;
    return this.x;
  }

  /** Returns a float in [0, 1); this is the Randomizer contract faker draws from. */
  next(): number {
    return this.nextUint32() / 0x100000000;
  }

  /** Restarts the sequence; faker calls this from `faker.seed()`. */
  seed(seed: number | number[]): void {
    this.x = initialState(foldSeed(seed), this.stream);
  }
}

const UINT64_MASK = (1n << 64n) - 1n;
const GOLDEN_GAMMA = 0x9e3779b97f4a7c15n;

/**
 * splitmix64 RNG with uint64 state, for draws wider than 32 bits.
 *
 * Initialization: state = (seed >>> 0) << 32 | fnv1a32(stream), or 0 for
 * the empty stream
 * Step: state += 0x9e3779b97f4a7c15, then the splitmix64 finalizer
 *
 * The finalizer is a bijection on uint64, so over its 2^64 period every
 * value, zero included, is returned exactly once.
 */
export class SplitMix64 {
  private state: bigint;

  constructor(seed: number, stream: string = '') {
    const mix = stream === '' ? 0 : fnv1a32(stream);
    this.state = (BigInt(seed >>> 0) << 32n) | BigInt(mix);
  }

  nextUint64(): bigint {
    this.state = (this.state + GOLDEN_GAMMA) & UINT64_MASK;
    let z = this.state;
    z = ((z ^ (z >> 30n)) * 0xbf58476d1ce4e5b9n) & UINT64_MASK;
    z = ((z ^ (z >> 27n)) * 0x94d049bb133111ebn) & UINT64_MASK;
    return z ^ (z >> 31n);
  }
}
