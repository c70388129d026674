/**
 * Tracked-key allow-list matching
 */

export type MatchMode = 'exact' | 'substring';

/** Allow-list entry that tracks every key */
export const TRACK_ALL = '*';

export class TrackedKeyMatcher {
  private readonly all: boolean;
  private readonly needles: string[];

  constructor(
    trackedKeys: readonly string[],
    private readonly mode: MatchMode = 'exact'
  ) {
    this.all = trackedKeys.includes(TRACK_ALL);
    this.needles = trackedKeys
      .map((key) => key.trim().toLowerCase())
      .filter((key) => key !== '' && key !== TRACK_ALL);
  }

  /**
   * Check whether any candidate (key part or subject label) is tracked.
   * Both modes compare case-insensitively.
   */
  matches(candidates: readonly string[]): boolean {
    if (this.all) return true;
    if (this.needles.length === 0) return false;

    const haystack = candidates.map((candidate) => candidate.trim().toLowerCase());
    return this.needles.some((needle) =>
      haystack.some((candidate) =>
        this.mode === 'exact' ? candidate === needle : candidate.includes(needle)
      )
    );
  }
}
