import { UsageError } from "./errors.ts";
import type { AuditArgs, CliSettings, MigrationArgs, ParsedOptions, PatternListArg } from "./types.ts";

export const AUDIT_USAGE =
  "Usage: azdo-audit-pipelines [--organization=<org>] [--project=<project>] [--pat=<token>] [--build-pipeline-patterns=<glob>,<glob>] [--config=<path>]";

export const MIGRATION_USAGE =
  "Usage: azdo-move-sprint-items --source-sprint=<name> --destination-sprint=<name> [--organization=<org>] [--project=<project>] [--pat=<token>] [--team=<team>] [--config=<path>] [--dry-run]";

const COMMON_OPTIONS = ["organization", "project", "pat", "config", "help"];

export function parseOptionArgs(args: string[] = []): ParsedOptions {
  const options: Record<string, string | boolean> = {};
  const positionals: string[] = [];

  const setOption = (key: string, value: string | boolean): void => {
    if (Object.hasOwn(options, key)) {
      throw new UsageError(`Option --${key} was given more than once.`);
    }
    options[key] = value;
  };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (arg === undefined) continue;

    if (!arg.startsWith("--")) {
      positionals.push(arg);
      continue;
    }

    const eqIndex = arg.indexOf("=");
    if (eqIndex >= 0) {
      setOption(arg.slice(2, eqIndex), arg.slice(eqIndex + 1));
      continue;
    }

    const key = arg.slice(2);
    const next = args[i + 1];
    if (next !== undefined && !next.startsWith("--")) {
      setOption(key, next);
      i += 1;
    } else {
      setOption(key, true);
    }
  }

  return { options, positionals };
}

function stringOption(value: string | boolean | undefined): string | undefined {
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function booleanOption(value: string | boolean | undefined): boolean {
  return value === true || value === "true" || value === "1";
}

export function parsePatternList(value: string | boolean | undefined): PatternListArg {
  if (value === undefined) {
    return { kind: "unset" };
  }
  if (typeof value !== "string") {
    return { kind: "empty" };
  }

  const patterns = value
    .split(",")
    .map((pattern) => pattern.trim())
    .filter((pattern) => pattern.length > 0);

  return patterns.length > 0 ? { kind: "provided", patterns } : { kind: "empty" };
}

function validateOptions(parsed: ParsedOptions, allowed: string[], usage: string): void {
  const allowedOptions = new Set([...COMMON_OPTIONS, ...allowed]);
  for (const key of Object.keys(parsed.options)) {
    if (!allowedOptions.has(key)) {
      throw new UsageError(`Unknown option: --${key}\n${usage}`);
    }
  }

  if (parsed.positionals.length > 0) {
    throw new UsageError(`Unexpected argument: ${parsed.positionals[0]}\n${usage}`);
  }
}

function commonSettings(options: Record<string, string | boolean>): CliSettings {
  return {
    organizationName: stringOption(options.organization),
    projectName: stringOption(options.project),
    pat: stringOption(options.pat),
    configPath: stringOption(options.config),
    buildPipelinePatterns: { kind: "unset" },
  };
}

export function parseAuditArgs(args: string[] = []): AuditArgs {
  const parsed = parseOptionArgs(args);
  validateOptions(parsed, ["build-pipeline-patterns"], AUDIT_USAGE);

  const { options } = parsed;
  return {
    help: booleanOption(options.help),
    settings: {
      ...commonSettings(options),
      buildPipelinePatterns: parsePatternList(options["build-pipeline-patterns"]),
    },
  };
}

export function parseMigrationArgs(args: string[] = []): MigrationArgs {
  const parsed = parseOptionArgs(args);
  validateOptions(parsed, ["team", "source-sprint", "destination-sprint", "dry-run"], MIGRATION_USAGE);

  const { options } = parsed;
  const help = booleanOption(options.help);
  const sourceSprintName = stringOption(options["source-sprint"]) ?? "";
  const destinationSprintName = stringOption(options["destination-sprint"]) ?? "";

  if (!help && (!sourceSprintName || !destinationSprintName)) {
    throw new UsageError(
      `Both --source-sprint and --destination-sprint are required.\n${MIGRATION_USAGE}`,
    );
  }

  return {
    help,
    settings: { ...commonSettings(options), teamName: stringOption(options.team) },
    sourceSprintName,
    destinationSprintName,
    dryRun: booleanOption(options["dry-run"]),
  };
}
