/**
 * Exclusion Domain Types
 */

/**
 * Facts about the machine a run happens on, in Go's vocabulary
 */
export interface HostInfo {
  readonly os: string; // GOOS
  readonly arch: string; // GOARCH
  readonly ci: boolean;
}

/**
 * When a rule applies. Every listed condition must hold; an empty predicate
 * always holds.
 */
export interface PlatformPredicate {
  readonly os?: readonly string[];
  readonly arch?: readonly string[];
  readonly ci?: boolean;
}

/**
 * Exclusion rule as written in configuration
 */
export interface ExclusionRuleConfig {
  readonly package: string;
  readonly test: string;
  readonly when?: PlatformPredicate;
  readonly reason?: string;
}

/**
 * Compiled exclusion rule; `exclude` is the predicate evaluated for this host
 */
export interface ExclusionRule {
  readonly packagePattern: RegExp;
  readonly testPattern: RegExp;
  readonly exclude: boolean;
  readonly reason?: string;
}

export interface ExclusionFilter {
  /** false when every test of the package is excluded */
  readonly include: boolean;
  readonly specificTests: string[];
  readonly excludedTests: string[];
}
