export interface ConfigurationIssue {
  variable: string;
  message: string;
}

export class ConfigurationError extends Error {
  readonly issues: ConfigurationIssue[];

  constructor(issues: ConfigurationIssue[]) {
    const lines = issues.map(issue => `${issue.variable}: ${issue.message}`);
    super(`Environment validation failed:\n${lines.join('\n')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }

  get variables(): string[] {
    return this.issues.map(issue => issue.variable);
  }
}

export class UnsupportedFrameError extends Error {
  constructor(frameType: string) {
    super(`Unsupported ${frameType} frame: only text frames are echoed`);
    this.name = 'UnsupportedFrameError';
  }
}

export interface ErrorDescription {
  errorType: string;
  message: string;
}

export function describeError(error: unknown): ErrorDescription {
  if (error instanceof Error) {
    return { errorType: error.name, message: error.message };
  }
  return { errorType: typeof error, message: String(error) };
}
