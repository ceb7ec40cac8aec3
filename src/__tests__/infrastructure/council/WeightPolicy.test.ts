import { planWeightUpdates, toWeightUpdates } from '../../../infrastructure/council/learning/WeightPolicy';
import { AgentId, AgentRoster } from '../../../domain/valueObjects/AgentRoster';

describe('planWeightUpdates', () => {
  const roster = new AgentRoster(['alpha', 'bravo']);
  const alpha = roster.require('alpha');
  const bravo = roster.require('bravo');
  const weights = new Map<AgentId, number>([[alpha, 1.0], [bravo, 1.0]]);

  it('should reward the winner on the full score and peers on half', () => {
    const plan = planWeightUpdates(weights, bravo, 9);

    const bravoUpdate = plan.get(bravo);
    const alphaUpdate = plan.get(alpha);
    // 1 + 0.2 * (9 - 7) / 3
    expect(bravoUpdate?.newWeight).toBeCloseTo(1.1333333, 6);
    expect(bravoUpdate?.wasWinner).toBe(true);
    expect(bravoUpdate?.learningRate).toBe(0.2);
    // 1 - 0.1 * (5 - 4.5) / 5
    expect(alphaUpdate?.newWeight).toBeCloseTo(0.99, 10);
    expect(alphaUpdate?.performanceScore).toBe(4.5);
    expect(alphaUpdate?.learningRate).toBe(0.1);
    expect(alphaUpdate?.wasWinner).toBe(false);
  });

  it('should treat everyone as a peer when there is no winner', () => {
    const plan = planWeightUpdates(weights, 'none', 9);

    expect([...plan.values()].every(update => !update.wasWinner)).toBe(true);
    expect(plan.get(bravo)?.newWeight).toBeCloseTo(0.99, 10);
  });

  it('should leave the input weights untouched', () => {
    planWeightUpdates(weights, alpha, 10);

    expect(weights.get(alpha)).toBe(1.0);
  });

  it('should strip planning fields for the iteration record', () => {
    const updates = toWeightUpdates(planWeightUpdates(weights, alpha, 10));

    expect(updates[alpha]).toEqual({
      previousWeight: 1.0,
      newWeight: expect.closeTo(1.2, 10),
      change: expect.closeTo(0.2, 10),
      wasWinner: true
    });
  });
});
