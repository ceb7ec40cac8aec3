import { NO_WINNER, UNKNOWN_WINNER } from './Decision';

declare const agentIdBrand: unique symbol;

/**
 * Agent identifier that has been checked against a registered roster.
 * Only {@link AgentRoster} narrows plain strings to this type.
 */
export type AgentId = string & { readonly [agentIdBrand]: true };

/** Per-agent values keyed by validated identifiers. */
export type AgentKeyed<T> = Partial<Record<AgentId, T>>;

export const ARBITRATOR_ID = 'arbitrator';

/** Leading letter keeps ids out of the integer-key ordering of plain objects. */
export const AGENT_ID_PATTERN = /^[a-z][a-z0-9_]*$/;

/** Taken by the decision winner sentinels. */
export const RESERVED_AGENT_IDS: readonly string[] = [NO_WINNER, UNKNOWN_WINNER];

export class AgentRoster {
  private readonly ids: ReadonlySet<string>;
  private readonly order: readonly string[];

  constructor(ids: readonly string[]) {
    const seen = new Set<string>();
    for (const id of ids) {
      if (!AGENT_ID_PATTERN.test(id)) {
        throw new Error(`Invalid agent identifier: "${id}"`);
      }
      if (RESERVED_AGENT_IDS.includes(id)) {
        throw new Error(`Reserved agent identifier: "${id}"`);
      }
      if (seen.has(id)) {
        throw new Error(`Duplicate agent identifier: "${id}"`);
      }
      seen.add(id);
    }
    this.ids = seen;
    this.order = [...ids];
  }

  has(value: string): value is AgentId {
    return this.ids.has(value);
  }

  /** Returns the identifier if registered, throwing otherwise. */
  require(value: string): AgentId {
    if (!this.has(value)) {
      throw new Error(`Unknown agent identifier: "${value}"`);
    }
    return value;
  }

  parse(value: string): AgentId | undefined {
    return this.has(value) ? value : undefined;
  }

  /** Registered identifiers in load order. */
  list(): AgentId[] {
    return this.order.filter((id): id is AgentId => this.has(id));
  }

  get size(): number {
    return this.ids.size;
  }
}
