/**
 * Startup configuration problem: a malformed ruleset or battle map.
 * Never thrown once the tick loop is running.
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid ${source}:\n  - ${issues.join('\n  - ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
