import { AgentRoster } from '../../domain/valueObjects/AgentRoster';
import { DecisionWinner, NO_WINNER, UNKNOWN_WINNER } from '../../domain/valueObjects/Decision';
import { logger, errorMessage } from '../logging/Logger';

export enum DecisionField {
  DECISION = 'DECISION',
  WINNER = 'WINNER',
  CONFIDENCE = 'CONFIDENCE',
  REASONING = 'REASONING',
  IMPLEMENTATION = 'IMPLEMENTATION'
}

export const NOT_SPECIFIED = 'Not specified';
export const PARSE_ERROR = 'Parse error';

const ALL_FIELDS: readonly DecisionField[] = Object.values(DecisionField);

/** Fields whose value continues on the following lines. */
const MULTILINE_FIELDS: ReadonlySet<DecisionField> = new Set([
  DecisionField.REASONING,
  DecisionField.IMPLEMENTATION
]);

export type DecisionFields = Record<DecisionField, string>;

function startsWithLabel(line: string, field: DecisionField): boolean {
  return line.trim().startsWith(`${field}:`);
}

function startsWithAnyLabel(line: string): boolean {
  return ALL_FIELDS.some(field => startsWithLabel(line, field));
}

/**
 * Value of the first line labelled `FIELD:`. Multi-line fields absorb every
 * following line until another recognized label opens a line.
 */
export function extractField(text: string, field: DecisionField): string {
  const lines = text.split('\n');

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (!startsWithLabel(line, field)) continue;

    let content = line.slice(line.indexOf(':') + 1).trim();

    if (MULTILINE_FIELDS.has(field)) {
      for (let j = i + 1; j < lines.length && !startsWithAnyLabel(lines[j]); j++) {
        content += '\n' + lines[j];
      }
    }

    return content.trim();
  }

  return NOT_SPECIFIED;
}

export function parseDecisionFields(text: string): DecisionFields {
  const fields: Partial<DecisionFields> = {};

  for (const field of ALL_FIELDS) {
    try {
      fields[field] = extractField(text, field);
    } catch (error) {
      logger.warn('Failed to extract decision field', { field, error: errorMessage(error) });
      fields[field] = PARSE_ERROR;
    }
  }

  return {
    DECISION: fields.DECISION ?? PARSE_ERROR,
    WINNER: fields.WINNER ?? PARSE_ERROR,
    CONFIDENCE: fields.CONFIDENCE ?? PARSE_ERROR,
    REASONING: fields.REASONING ?? PARSE_ERROR,
    IMPLEMENTATION: fields.IMPLEMENTATION ?? PARSE_ERROR
  };
}

/**
 * Maps the declared WINNER text onto a participant. Surrounding brackets,
 * quotes, backticks and emphasis markers are ignored, as is case.
 */
export function resolveWinner(declared: string, participants: AgentRoster): DecisionWinner {
  const normalized = declared
    .trim()
    .replace(/^[\s[\]"'`*]+|[\s[\]"'`*]+$/g, '')
    .toLowerCase();

  if (normalized === NO_WINNER) {
    return NO_WINNER;
  }

  return participants.parse(normalized) ?? UNKNOWN_WINNER;
}
