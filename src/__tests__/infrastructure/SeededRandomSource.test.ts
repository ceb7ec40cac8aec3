import { SeededRandomSource } from '../../infrastructure/random/SeededRandomSource';
import { shuffle } from '../../domain/services/IRandomSource';

describe('SeededRandomSource', () => {
  function draw(source: SeededRandomSource, count: number): number[] {
    return Array.from({ length: count }, () => source.next());
  }

  it('should repeat the sequence for the same seed', () => {
    expect(draw(new SeededRandomSource(42), 5)).toEqual(draw(new SeededRandomSource(42), 5));
  });

  it('should differ between seeds', () => {
    expect(draw(new SeededRandomSource(1), 5)).not.toEqual(draw(new SeededRandomSource(2), 5));
  });

  it('should produce values in [0, 1)', () => {
    for (const value of draw(new SeededRandomSource(7), 200)) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('should shuffle without losing items', () => {
    const items = ['a', 'b', 'c', 'd', 'e'];

    const shuffled = shuffle(new SeededRandomSource(3), items);

    expect([...shuffled].sort()).toEqual(items);
    expect(items).toEqual(['a', 'b', 'c', 'd', 'e']);
  });
});
