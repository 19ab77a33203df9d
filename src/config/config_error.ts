export type GovernorConfigErrorCode = "invalid_config";

export interface GovernorConfigIssue {
  // Env var name when known, otherwise the dotted config path
  key: string;
  message: string;
}

const MAX_REPORTED_ISSUES = 10;

export class GovernorConfigError extends Error {
  public readonly code: GovernorConfigErrorCode;
  public readonly issues: GovernorConfigIssue[];

  constructor(issues: GovernorConfigIssue[]) {
    const shown = issues.slice(0, MAX_REPORTED_ISSUES);
    super(
      `Invalid configuration: ${shown.map((issue) => `${issue.key}: ${issue.message}`).join("; ")}`
    );
    this.name = "GovernorConfigError";
    this.code = "invalid_config";
    this.issues = shown;
  }

  toJSON() {
    return {
      error: this.code,
      message: this.message,
      issues: this.issues,
    };
  }
}
