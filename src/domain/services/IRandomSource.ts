export interface IRandomSource {
  /**
   * Uniform float in [0, 1)
   */
  next(): number;
}

export function randomInt(source: IRandomSource, min: number, max: number): number {
  return min + Math.floor(source.next() * (max - min + 1));
}

export function randomFloat(source: IRandomSource, min: number, max: number): number {
  return min + source.next() * (max - min);
}

/** Fisher-Yates shuffle into a new array. */
export function shuffle<T>(source: IRandomSource, items: readonly T[]): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(source.next() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}
