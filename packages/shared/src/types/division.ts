/**
 * A row of the static division table.
 * Patterns are unanchored regular expressions searched in a game's division field.
 */
export interface DivisionRuleDefinition {
  name: string; // e.g. "U13 A"
  pattern: string; // membership, e.g. "U13.*A"
  swaps: string; // human-readable swap targets, e.g. "U13 A -> U15 A-B"
  swapsPattern: string; // compatibility, e.g. "U13.*[A]|U15.*[A-B]"
}

/**
 * Division as exposed by the API
 */
export interface DivisionSummary {
  name: string;
  description: string;
}
