/**
 * Team names in the schedule pick up a score once a game is played:
 *   "BLACKBURN STINGERS U15 B1 (1)" -> "BLACKBURN STINGERS U15 B1"
 * Every comparison between team names must go through normalizeTeamName.
 */
export function normalizeTeamName(raw: string): string {
  const scoreStart = raw.indexOf(' (');
  const name = scoreStart === -1 ? raw : raw.slice(0, scoreStart);
  return name.toUpperCase();
}

/**
 * True when both raw names denote the same team
 */
export function sameTeam(a: string, b: string): boolean {
  return normalizeTeamName(a) === normalizeTeamName(b);
}

/**
 * Append the normalized name unless the list already holds it (case-insensitive).
 * Returns the same list when nothing was added. First-seen order is kept.
 */
export function addUnique(list: string[], raw: string): string[] {
  const name = normalizeTeamName(raw);
  if (list.some((entry) => entry.toUpperCase() === name)) {
    return list;
  }
  return [...list, name];
}
