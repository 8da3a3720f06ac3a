/**
 * Versioned denylist of the phrasing Azure DevOps and its integrations use
 * for automated pull request comments. Anything not matched is treated as
 * human feedback.
 */
export interface NoisePolicy {
  /** Identifies the pattern set in logs and run reports. */
  version: string;
  /** Trimmed comments shorter than this are noise. */
  minLength: number;
  /** Authors whose identity starts with this prefix are automated. */
  systemActorPrefix: string;
  /**
   * Case-insensitive regular expression sources, matched anywhere in the
   * text. Compiled without the `u` flag, so `\b`, `\w` and `\d` are
   * ASCII-only: `Ümerged` still matches `\bmerged\b`.
   */
  patterns: readonly string[];
}

export const SYSTEM_ACTOR_PREFIX = 'microsoft.visualstudio.services.tfs';

export const DEFAULT_NOISE_PATTERNS: readonly string[] = [
  'policy status has been updated',
  'voted',
  'updated the pull request status to',
  'joined as a reviewer',
  'Conflicts are resolved',
  'Submitted conflict resolution',
  'from the reviewers',
  'a required reviewer',
  'an optional reviewer',
  'as a reviewer',
  'set auto-complete',
  'is changed to be a required reviewer',
  'SonarQube',
  'voted\\s+\\d+',
  'the reference refs/heads/.*was updated',
  'updated the pull request status to Abandoned',
  '\\b(merged|abandoned|completed)\\b',
];

export const DEFAULT_NOISE_POLICY: NoisePolicy = {
  version: '1',
  minLength: 4,
  systemActorPrefix: SYSTEM_ACTOR_PREFIX,
  patterns: DEFAULT_NOISE_PATTERNS,
};

export interface NoiseFilter {
  readonly policy: NoisePolicy;
  isNoise(text: string | null | undefined, authorIdentity: string): boolean;
}

/**
 * Compile the policy's patterns into one alternation. Returns null for an
 * empty pattern list.
 *
 * @throws SyntaxError when a pattern is not a valid regular expression.
 */
export function compileNoisePatterns(patterns: readonly string[]): RegExp | null {
  if (patterns.length === 0) return null;
  return new RegExp(patterns.map((p) => `(?:${p})`).join('|'), 'i');
}

export function createNoiseFilter(policy: NoisePolicy = DEFAULT_NOISE_POLICY): NoiseFilter {
  const statusRegex = compileNoisePatterns(policy.patterns);
  const actorPrefix = policy.systemActorPrefix.toLowerCase();

  return {
    policy,
    isNoise(text, authorIdentity) {
      if (!text || text.trim().length < policy.minLength) return true;
      if (actorPrefix && authorIdentity.toLowerCase().startsWith(actorPrefix)) return true;
      return statusRegex !== null && statusRegex.test(text);
    },
  };
}

const defaultFilter = createNoiseFilter();

/**
 * Decide with the default policy whether a comment is automated chatter.
 */
export function isNoise(text: string | null | undefined, authorIdentity: string): boolean {
  return defaultFilter.isNoise(text, authorIdentity);
}
