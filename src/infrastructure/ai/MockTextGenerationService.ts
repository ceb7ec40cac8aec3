import { ITextGenerationService, TextGenerationRequest } from '../../domain/services/ITextGenerationService';
import { logger } from '../logging/Logger';

const WEIGHT_LINE = /^- ([a-z0-9_]+): (\d+(?:\.\d+)?)$/;

/**
 * Offline stand-in used when no provider key is configured. Answers are
 * derived from the prompt alone, so repeated runs produce the same text.
 */
export class MockTextGenerationService implements ITextGenerationService {
  readonly provider = 'mock';

  async complete(request: TextGenerationRequest): Promise<string> {
    const prompt = request.userPrompt;
    logger.debug('Using mock completion (mock mode enabled)');

    if (prompt.includes('TASK: As the Arbitrator')) {
      return this.mockDecision(prompt);
    }
    if (prompt.includes('Provide ONLY the post text')) {
      return this.mockPost(prompt);
    }
    if (prompt.includes('TASK: Critique')) {
      return 'The proposals trade long-term brand trust for short-term reach. ' +
        'Tighten the message, keep the claims verifiable and add a clear call-to-action. Rating: 6/10.';
    }
    return [
      '1. Twitter: a short, bold launch thread built around the top trend. Potential: 8/10.',
      '2. LinkedIn: a founder story with concrete time-saving numbers. Potential: 7/10.'
    ].join('\n');
  }

  /** Backs the participant with the highest listed weight; ties keep list order. */
  private mockDecision(prompt: string): string {
    let winner = 'none';
    let best = -Infinity;

    const weightsSection = prompt.split('AGENT VOTING WEIGHTS')[1] ?? '';
    for (const line of weightsSection.split('\n')) {
      const match = WEIGHT_LINE.exec(line.trim());
      if (match && Number(match[2]) > best) {
        best = Number(match[2]);
        winner = match[1];
      }
    }

    return `DECISION: Lead with ${winner}'s proposal, refined by the critiques
WINNER: ${winner}
CONFIDENCE: 7
REASONING: ${winner} carries the strongest track record in this council.
The critiques add useful guardrails on tone.
IMPLEMENTATION: Platform: Twitter
Content approach: short launch announcement tied to a current trend
Key message: the product saves time every week
Tone: Bold`;
  }

  private mockPost(prompt: string): string {
    const brand = /^BRAND: (.*)$/m.exec(prompt)?.[1] ?? 'Our brand';
    return `${brand} is here to give you your week back. Try it today and see the difference. #Productivity #Launch`;
  }
}
