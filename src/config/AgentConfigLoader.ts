import { promises as fs } from 'fs';
import Joi from 'joi';
import { AgentProfile, MAX_VOTING_WEIGHT, MIN_VOTING_WEIGHT } from '../domain/entities/AgentProfile';
import { AppError } from '../domain/errors/AppError';
import { ITextGenerationService } from '../domain/services/ITextGenerationService';
import {
  AGENT_ID_PATTERN,
  AgentRoster,
  ARBITRATOR_ID,
  RESERVED_AGENT_IDS
} from '../domain/valueObjects/AgentRoster';
import { Arbitrator } from '../infrastructure/council/agents/Arbitrator';
import { CouncilAgent } from '../infrastructure/council/agents/CouncilAgent';
import { CouncilMembers } from '../infrastructure/council/agents/CouncilMembers';
import { logger } from '../infrastructure/logging/Logger';

export interface AgentDefinition {
  name: string;
  role: string;
  personality: string;
  goals: string[];
  voting_weight?: number;
  color?: string;
}

export interface AgentsFile {
  agents: Record<string, AgentDefinition>;
}

const agentDefinitionSchema = Joi.object<AgentDefinition>({
  name: Joi.string().required(),
  role: Joi.string().required(),
  personality: Joi.string().required(),
  goals: Joi.array().items(Joi.string()).min(1).required(),
  voting_weight: Joi.number().min(MIN_VOTING_WEIGHT).max(MAX_VOTING_WEIGHT),
  color: Joi.string().pattern(/^#[0-9a-fA-F]{6}$/)
});

const agentsFileSchema = Joi.object<AgentsFile>({
  agents: Joi.object()
    .pattern(
      Joi.string().pattern(AGENT_ID_PATTERN).invalid(...RESERVED_AGENT_IDS),
      agentDefinitionSchema
    )
    .required()
});

export function parseAgentsFile(candidate: unknown): AgentsFile {
  const { error, value } = agentsFileSchema.validate(candidate, { abortEarly: false });
  if (error) {
    throw AppError.configurationError(
      'Invalid agent configuration',
      error.details.map(detail => detail.message)
    );
  }
  if (!(ARBITRATOR_ID in value.agents)) {
    throw AppError.configurationError(`Agent configuration must define "${ARBITRATOR_ID}"`);
  }
  if (Object.keys(value.agents).length < 2) {
    throw AppError.configurationError('Agent configuration needs at least one participant');
  }
  return value;
}

/**
 * Builds the participants (in file order) and the arbitrator. Every agent
 * shares the one text generation service.
 */
export function buildCouncilMembers(file: AgentsFile, textService: ITextGenerationService): CouncilMembers {
  const participantIds = Object.keys(file.agents).filter(id => id !== ARBITRATOR_ID);
  const participants = new AgentRoster(participantIds);
  const everyone = new AgentRoster([...participantIds, ARBITRATOR_ID]);

  const toProfile = (id: string): AgentProfile => {
    const definition = file.agents[id];
    return new AgentProfile(
      everyone.require(id),
      definition.name,
      definition.role,
      definition.personality,
      definition.goals,
      definition.voting_weight ?? 1.0,
      definition.color ?? '#000000'
    );
  };

  const agents = participantIds.map(id => new CouncilAgent(toProfile(id), textService));
  const arbitrator = new Arbitrator(toProfile(ARBITRATOR_ID), textService, participants);

  logger.info('Council loaded', { participants: participantIds, provider: textService.provider });

  return { participants, agents, arbitrator };
}

export async function loadCouncilMembers(
  configPath: string,
  textService: ITextGenerationService
): Promise<CouncilMembers> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(configPath, 'utf8'));
  } catch (error) {
    throw AppError.configurationError(`Cannot read agent configuration at ${configPath}`, {
      cause: error instanceof Error ? error.message : 'Unknown error'
    });
  }
  return buildCouncilMembers(parseAgentsFile(raw), textService);
}
