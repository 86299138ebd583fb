import type { DivisionRuleDefinition, DivisionSummary } from '@game-swap/shared';
import { AmbiguousDivisionError, DivisionConfigError } from '../errors.js';

/**
 * Division names and the league's rules for swapping games.
 *
 * Game switch alternatives:
 *   U11 A-C <-> U13 B-C
 *   U13 A   <-> U15 A-B
 *   U15 A-B <-> U18 A-B
 */
export const DIVISION_TABLE: readonly DivisionRuleDefinition[] = [
  // U9
  { name: 'U9 A', pattern: 'U9.*A', swaps: 'U9 A -> U9 A-C', swapsPattern: 'U9.*[A-C]' },
  { name: 'U9 B', pattern: 'U9.*B', swaps: 'U9 B -> U9 A-C', swapsPattern: 'U9.*[A-C]' },
  { name: 'U9 C', pattern: 'U9.*C', swaps: 'U9 C -> U9 A-C', swapsPattern: 'U9.*[A-C]' },
  // U11
  { name: 'U11 A', pattern: 'U11.*A', swaps: 'U11 A -> U11 A-C, U13 B-C', swapsPattern: 'U11.*[A-C]|U13.*[B-C]' },
  { name: 'U11 B', pattern: 'U11.*B', swaps: 'U11 B -> U11 A-C, U13 B-C', swapsPattern: 'U11.*[A-C]|U13.*[B-C]' },
  { name: 'U11 C', pattern: 'U11.*C', swaps: 'U11 C -> U11 A-C, U13 B-C', swapsPattern: 'U11.*[A-C]|U13.*[B-C]' },
  // U13
  { name: 'U13 A', pattern: 'U13.*A', swaps: 'U13 A -> U15 A-B', swapsPattern: 'U13.*[A]|U15.*[A-B]' },
  { name: 'U13 B', pattern: 'U13.*B', swaps: 'U13 B -> U11 A-C, U13 B-C', swapsPattern: 'U13.*[B-C]|U11.*[A-C]' },
  { name: 'U13 C', pattern: 'U13.*C', swaps: 'U13 C -> U11 A-C, U13 B-C', swapsPattern: 'U13.*[B-C]|U11.*[A-C]' },
  // U15
  { name: 'U15 A', pattern: 'U15.*A', swaps: 'U15 A -> U13 A, U15 A-B, U18 A-B', swapsPattern: 'U13.*A|U15.*[A-B]|U18.*[A-B]' },
  { name: 'U15 B', pattern: 'U15.*B', swaps: 'U15 B -> U13 A, U15 A-B, U18 A-B', swapsPattern: 'U13.*A|U15.*[A-B]|U18.*[A-B]' },
  // U18
  { name: 'U18 A', pattern: 'U18.*A', swaps: 'U18 A -> U15 A-B, U18 A-B', swapsPattern: 'U15.*[A-B]|U18.*[A-B]' },
  { name: 'U18 B', pattern: 'U18.*B', swaps: 'U18 B -> U15 A-B, U18 A-B', swapsPattern: 'U15.*[A-B]|U18.*[A-B]' },
];

/**
 * A division with its two compiled predicates
 */
export interface DivisionRule {
  readonly name: string;
  readonly description: string;
  /** Does a game's division label belong to this division */
  matches(label: string): boolean;
  /** May a game with this division label be swapped with a game of this division */
  isCompatible(label: string): boolean;
}

function compilePattern(definition: DivisionRuleDefinition, pattern: string): RegExp {
  try {
    return new RegExp(pattern);
  } catch (error) {
    throw new DivisionConfigError(
      `Division ${definition.name} has an invalid pattern "${pattern}": ${String(error)}`
    );
  }
}

function compileRule(definition: DivisionRuleDefinition): DivisionRule {
  const membership = compilePattern(definition, definition.pattern);
  const compatibility = compilePattern(definition, definition.swapsPattern);
  return Object.freeze({
    name: definition.name,
    description: definition.swaps,
    matches: (label: string) => membership.test(label),
    isCompatible: (label: string) => compatibility.test(label),
  });
}

export function toDivisionSummary(rule: DivisionRule): DivisionSummary {
  return { name: rule.name, description: rule.description };
}

/**
 * Immutable set of division rules, validated when constructed:
 * - every pattern compiles
 * - names are unique
 * - each division's own name matches its own membership pattern and no other
 * - each division is swap-compatible with itself
 */
export class DivisionRegistry {
  private readonly rules: readonly DivisionRule[];
  private readonly byName: ReadonlyMap<string, DivisionRule>;

  constructor(definitions: readonly DivisionRuleDefinition[]) {
    const rules = definitions.map(compileRule);
    const byName = new Map<string, DivisionRule>();

    for (const rule of rules) {
      if (byName.has(rule.name)) {
        throw new DivisionConfigError(`Division ${rule.name} is defined more than once`);
      }
      byName.set(rule.name, rule);
    }

    for (const rule of rules) {
      const owners = rules.filter((candidate) => candidate.matches(rule.name)).map((r) => r.name);
      if (owners.length !== 1 || owners[0] !== rule.name) {
        throw new DivisionConfigError(
          `Division ${rule.name} must match only its own pattern, matched: [${owners.join(', ')}]`
        );
      }
      if (!rule.isCompatible(rule.name)) {
        throw new DivisionConfigError(`Division ${rule.name} is not swap-compatible with itself`);
      }
    }

    this.rules = Object.freeze(rules);
    this.byName = byName;
  }

  /**
   * Find the one division a game's division label belongs to
   */
  resolve(label: string): DivisionRule {
    const matched = this.rules.filter((rule) => rule.matches(label));
    if (matched.length !== 1) {
      throw new AmbiguousDivisionError(
        label,
        matched.map((rule) => rule.name)
      );
    }
    return matched[0];
  }

  get(name: string): DivisionRule | undefined {
    return this.byName.get(name);
  }

  list(): readonly DivisionRule[] {
    return this.rules;
  }
}

export const defaultDivisionRegistry = new DivisionRegistry(DIVISION_TABLE);
