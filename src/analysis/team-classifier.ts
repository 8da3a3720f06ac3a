export const OTHER_TEAM = 'other';

/**
 * Team label → member identities. Iteration order decides precedence when
 * an identity is listed under more than one team.
 */
export type TeamRoster = ReadonlyMap<string, ReadonlySet<string>>;

/**
 * Build a roster from configuration, lower-casing every identity.
 */
export function buildRoster(teams: Record<string, readonly string[]>): TeamRoster {
  const roster = new Map<string, ReadonlySet<string>>();
  for (const [label, members] of Object.entries(teams)) {
    roster.set(label, new Set(members.map((m) => m.trim().toLowerCase())));
  }
  return roster;
}

/** Every label a comment can be attributed to, catch-all last. */
export function teamLabels(roster: TeamRoster): string[] {
  return [...roster.keys(), OTHER_TEAM];
}

export function classifyTeam(authorIdentity: string, roster: TeamRoster): string {
  const author = authorIdentity.toLowerCase();
  for (const [label, members] of roster) {
    if (members.has(author)) return label;
  }
  return OTHER_TEAM;
}

export type TwoTeamLabel = 'team_a' | 'team_b' | typeof OTHER_TEAM;

/**
 * Two-team form of {@link classifyTeam}; `teamA` wins over `teamB`.
 */
export function classify(
  authorIdentity: string,
  teamA: Iterable<string>,
  teamB: Iterable<string>,
): TwoTeamLabel {
  const roster = buildRoster({ team_a: [...teamA], team_b: [...teamB] });
  const label = classifyTeam(authorIdentity, roster);
  return label === 'team_a' || label === 'team_b' ? label : OTHER_TEAM;
}
