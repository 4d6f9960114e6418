import { randomUUID } from "crypto";
import { Rng } from "../types/search";

/** FNV-1a over the UTF-16 code units of `s`; never 0. */
function seedFromString(s: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < s.length; i++) {
    hash ^= s.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash === 0 ? 1 : hash;
}

/**
 * xorshift32 generator. The only randomness self-play and search consume,
 * so a seed string replays a whole run.
 */
export class SeededRng implements Rng {
  private state: number;

  constructor(seed: string) {
    this.state = seedFromString(seed);
  }

  /** Next unsigned 32-bit value */
  next(): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    return this.state;
  }

  nextFloat(): number {
    return this.next() / 4294967296;
  }

  nextInt(max: number): number {
    return Math.floor(this.nextFloat() * max);
  }
}

/** Seeded when a seed is given, otherwise seeded from a fresh UUID. */
export function createRng(seed?: string): SeededRng {
  return new SeededRng(seed && seed.length > 0 ? seed : randomUUID());
}
