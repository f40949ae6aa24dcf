const twoPow21 = 2 ** 21;
const twoPow53 = 2 ** 53;

/** SplitMix32 finalizer: scatters a 32-bit input over the full 32-bit range */
export function mix32(x: number): number {
  let t = (x + 0x9e3779b9) >>> 0;
  t = Math.imul(t ^ (t >>> 16), 0x21f0aaad);
  t = Math.imul(t ^ (t >>> 15), 0x735a2d97);
  return (t ^ (t >>> 15)) >>> 0;
}

/**
 * Counter-based hash sequence.
 *
 * Element i of a stream depends only on (seed, stream, i), never on how many
 * elements are requested, so a dataset of size 100 is a prefix-compatible
 * sibling of one of size 100000 rather than a differently-wrapped sequence.
 */
export class HashStream {
  private readonly hiKey: number;
  private readonly loKey: number;
  private counter = 0;

  constructor(seed: number, stream: number) {
    const key = mix32(mix32(seed >>> 0) ^ Math.imul(stream + 1, 0x85ebca6b));
    this.hiKey = key;
    this.loKey = mix32(key ^ 0x5bd1e995);
  }

  /** @return hash of the next counter value as a fraction in [0, 1) */
  next(): number {
    const c = mix32(this.counter++);
    const hi = mix32(c ^ this.hiKey);
    const lo = mix32(c ^ this.loKey);
    return (hi * twoPow21 + (lo >>> 11)) / twoPow53;
  }

  /** @return integer in [0, n), scaled by multiplication rather than modulo */
  nextBelow(n: number): number {
    return Math.floor(this.next() * n);
  }
}

/** Shuffle values in place with a hashed Fisher-Yates */
export function hashShuffle<T>(values: T[], stream: HashStream): T[] {
  for (let i = values.length - 1; i > 0; i--) {
    const j = stream.nextBelow(i + 1);
    const tmp = values[i];
    values[i] = values[j];
    values[j] = tmp;
  }
  return values;
}

/** @return repeatable random source in [0, 1) for resampling */
export function seededRandom(seed: number): () => number {
  const stream = new HashStream(seed, 0x5eed);
  return () => stream.next();
}
