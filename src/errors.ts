export type SettingField = "organizationName" | "projectName" | "personalAccessToken";

/** Expected failures: printed as their message, without a stack. */
export class ToolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class UsageError extends ToolError {}

export class ConfigError extends ToolError {
  readonly field: SettingField;
  readonly sources: string[];

  constructor(field: SettingField, label: string, sources: string[]) {
    super(`Missing ${label}. Checked: ${sources.join(", ")}.`);
    this.field = field;
    this.sources = sources;
  }
}

export class SprintNotFoundError extends ToolError {
  readonly sprintName: string;

  constructor(sprintName: string, teamLabel: string) {
    super(`Sprint "${sprintName}" was not found in the iterations of ${teamLabel}.`);
    this.sprintName = sprintName;
  }
}

export class InvalidPatternError extends ToolError {
  readonly pattern: string;

  constructor(pattern: string, reason: string) {
    super(`Invalid build pipeline pattern "${pattern}": ${reason}`);
    this.pattern = pattern;
  }
}

function statusCodeOf(error: Error): number | undefined {
  if ("statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  return undefined;
}

export function formatError(error: unknown): string {
  if (error instanceof ToolError) {
    return error.message;
  }

  if (error instanceof Error) {
    const statusCode = statusCodeOf(error);
    const detail = error.stack ?? `${error.name}: ${error.message}`;
    return statusCode !== undefined
      ? `Azure DevOps API request failed (${statusCode}). ${detail}`
      : detail;
  }

  return String(error);
}
