const UINT32_RANGE = 0x1_0000_0000;

export class Xorshift32 {
  #state: number;

  constructor(seed: number) {
    // An all-zero state would only ever yield zeros.
    this.#state = seed >>> 0 || 0x9e3779b9;
  }

  get state(): number {
    return this.#state;
  }

  nextUint32(): number {
    let x = this.#state >>> 0;
    x ^= (x << 13) >>> 0;
    x ^= x >>> 17;
    x ^= (x << 5) >>> 0;
    this.#state = x >>> 0;
    return this.#state;
  }

  /** Uniform float in [0, 1). */
  nextFloat(): number {
    return this.nextUint32() / UINT32_RANGE;
  }

  nextIndex(length: number): number {
    if (!Number.isInteger(length) || length <= 0) throw new RangeError(`nextIndex: length must be a positive integer, got ${length}`);
    return Math.floor(this.nextFloat() * length);
  }
}
