import { AgentProfile } from '../../../domain/entities/AgentProfile';
import { AgentKeyed, AgentRoster } from '../../../domain/valueObjects/AgentRoster';
import { CampaignContext } from '../../../domain/valueObjects/CampaignContext';
import { Decision, failedDecision } from '../../../domain/valueObjects/Decision';
import { ITextGenerationService } from '../../../domain/services/ITextGenerationService';
import { logger, errorMessage } from '../../logging/Logger';
import { DecisionField, parseDecisionFields, resolveWinner } from '../DecisionParser';
import { CouncilAgent, GenerationSettings } from './CouncilAgent';

export const DECISION_SETTINGS: GenerationSettings = { temperature: 0.6, maxTokens: 1000 };

const DEFAULT_WEIGHT = 1.0;

const RESPONSE_FORMAT = `Provide your response in this EXACT format:

DECISION: [Choose the best approach - can be one agent's proposal or a hybrid]

WINNER: [Agent ID of the primary winner, e.g. one of the ids listed above]

CONFIDENCE: [Your confidence in this decision, 1-10]

REASONING: [Detailed explanation of why this is the best choice, considering:
- Strategic alignment with brand goals
- Risk vs reward trade-off
- Agent voting weights
- Platform optimization
- Expected performance]

IMPLEMENTATION: [Specific details of the final post strategy:
- Platform: [Twitter/Instagram/LinkedIn]
- Content approach: [Brief description]
- Key message: [Main point to communicate]
- Tone: [Professional/Casual/Bold/etc.]
]`;

export class Arbitrator extends CouncilAgent {
  constructor(
    profile: AgentProfile,
    textService: ITextGenerationService,
    private readonly participants: AgentRoster
  ) {
    super(profile, textService);
  }

  /**
   * Weighs the debate and picks the approach to publish. A failed
   * completion yields a decision with no winner instead of an error.
   */
  async decide(
    context: CampaignContext,
    proposals: AgentKeyed<string>,
    critiques: AgentKeyed<string>,
    agentWeights: AgentKeyed<number>
  ): Promise<Decision> {
    const userPrompt = `BRAND CONTEXT:
Brand: ${context.brandName}
Product: ${context.productInfo}

FULL DEBATE:
${this.buildTranscript(proposals, critiques, agentWeights)}

AGENT VOTING WEIGHTS (based on past performance):
${this.formatWeights(agentWeights)}

TASK: As the Arbitrator, make the final decision.

${RESPONSE_FORMAT}
`;

    let response: string;
    try {
      response = await this.generate(userPrompt, DECISION_SETTINGS);
    } catch (error) {
      logger.error('Arbitrator failed to reach a decision', { error: errorMessage(error) });
      return failedDecision(errorMessage(error));
    }

    const fields = parseDecisionFields(response);
    const winner = resolveWinner(fields[DecisionField.WINNER], this.participants);

    logger.info('Arbitrator decision parsed', {
      declaredWinner: fields[DecisionField.WINNER],
      winner,
      confidence: fields[DecisionField.CONFIDENCE]
    });

    return {
      decision: fields[DecisionField.DECISION],
      winner,
      declaredWinner: fields[DecisionField.WINNER],
      confidence: fields[DecisionField.CONFIDENCE],
      reasoning: fields[DecisionField.REASONING],
      implementation: fields[DecisionField.IMPLEMENTATION],
      fullResponse: response
    };
  }

  private buildTranscript(
    proposals: AgentKeyed<string>,
    critiques: AgentKeyed<string>,
    agentWeights: AgentKeyed<number>
  ): string {
    let transcript = 'PROPOSALS:\n';
    for (const [agentId, proposal] of Object.entries(proposals)) {
      const weight = agentWeights[this.participants.require(agentId)] ?? DEFAULT_WEIGHT;
      transcript += `\n${agentId.toUpperCase()} (weight: ${weight.toFixed(2)}):\n${proposal ?? ''}\n`;
    }

    transcript += '\n\nCRITIQUES:\n';
    for (const [agentId, critique] of Object.entries(critiques)) {
      transcript += `\n${agentId.toUpperCase()}:\n${critique ?? ''}\n`;
    }

    return transcript;
  }

  private formatWeights(agentWeights: AgentKeyed<number>): string {
    return Object.entries(agentWeights)
      .map(([agentId, weight]) => `- ${agentId}: ${(weight ?? DEFAULT_WEIGHT).toFixed(2)}`)
      .join('\n');
  }
}
