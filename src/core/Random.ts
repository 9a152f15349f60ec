/**
 * Источник псевдослучайных чисел в [0, 1). Внедряется в контроллер и детектор,
 * чтобы тесты могли задавать детерминированную последовательность.
 */
export interface RandomSource {
  random(): number;
}

/** mulberry32: короткий воспроизводимый генератор по seed. */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  random(): number {
    this.state = (this.state + 0x6D2B79F5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }
}

export function uniform(rng: RandomSource, min: number, max: number): number {
  return min + (max - min) * rng.random();
}
