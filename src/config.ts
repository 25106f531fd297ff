import { readFileSync, existsSync } from "node:fs";
import { join, resolve } from "node:path";
import { buildOrganizationUrl } from "./api.ts";
import { ConfigError } from "./errors.ts";
import { compilePatterns } from "./pattern-filter.ts";
import type { CliSettings, Env, FileConfig, Logger, PatternListArg, Settings } from "./types.ts";

export const DEFAULT_CONFIG_FILENAME = "azdo-tools.json";
export const PAT_ENV_VAR = "AZDO_PAT";

export function getConfigFilePath(cwd: string, explicitPath?: string): string {
  return explicitPath ? resolve(cwd, explicitPath) : join(cwd, DEFAULT_CONFIG_FILENAME);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function optionalStringArray(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter((item): item is string => typeof item === "string");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseFileConfig(raw: unknown): FileConfig | null {
  if (!isRecord(raw)) return null;

  return {
    organizationName: optionalString(raw.OrganizationName),
    projectName: optionalString(raw.ProjectName),
    pat: optionalString(raw.Pat),
    buildPipelinePatterns: optionalStringArray(raw.BuildPipelinePatterns),
    teamName: optionalString(raw.TeamName),
  };
}

export function loadFileConfig(
  configPath: string,
  logger: Logger = console,
  explicit = false,
): FileConfig {
  if (!existsSync(configPath)) {
    if (explicit) {
      logger.warn(`Warning: config file ${configPath} does not exist. Ignoring.`);
    }
    return {};
  }

  const content = readFileSync(configPath, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    logger.warn(`Warning: could not parse config file at ${configPath}. Ignoring.`);
    return {};
  }

  const parsed = parseFileConfig(raw);
  if (!parsed) {
    logger.warn(`Warning: config file at ${configPath} is not a JSON object. Ignoring.`);
    return {};
  }
  return parsed;
}

export function censorPat(pat: string): string {
  if (pat.length <= 8) {
    return "****";
  }
  return `${pat.slice(0, 4)}${"*".repeat(pat.length - 8)}${pat.slice(-4)}`;
}

export function firstNonEmpty(...candidates: (string | undefined)[]): string | undefined {
  for (const candidate of candidates) {
    const trimmed = candidate?.trim();
    if (trimmed) return trimmed;
  }
  return undefined;
}

export function resolvePatterns(cli: PatternListArg, fileValue: string[] | undefined): string[] {
  switch (cli.kind) {
    case "provided":
      return [...cli.patterns];
    case "empty":
      return [];
    case "unset":
      return (fileValue ?? []).map((pattern) => pattern.trim()).filter((pattern) => pattern);
  }
}

export interface ResolveSettingsInput {
  cli: CliSettings;
  file: FileConfig;
  env: Env;
  configPath: string;
}

export function resolveSettings({ cli, file, env, configPath }: ResolveSettingsInput): Settings {
  const organizationName = firstNonEmpty(cli.organizationName, file.organizationName);
  if (!organizationName) {
    throw new ConfigError("organizationName", "organization name", [
      "--organization argument",
      `"OrganizationName" in ${configPath}`,
    ]);
  }

  const projectName = firstNonEmpty(cli.projectName, file.projectName);
  if (!projectName) {
    throw new ConfigError("projectName", "project name", [
      "--project argument",
      `"ProjectName" in ${configPath}`,
    ]);
  }

  const personalAccessToken = firstNonEmpty(cli.pat, file.pat, env[PAT_ENV_VAR]);
  if (!personalAccessToken) {
    throw new ConfigError("personalAccessToken", "personal access token", [
      "--pat argument",
      `"Pat" in ${configPath}`,
      `${PAT_ENV_VAR} environment variable`,
    ]);
  }

  const teamName = firstNonEmpty(cli.teamName, file.teamName);
  const buildPipelinePatterns = resolvePatterns(
    cli.buildPipelinePatterns,
    file.buildPipelinePatterns,
  );
  compilePatterns(buildPipelinePatterns);

  return Object.freeze({
    organizationName,
    organizationUrl: buildOrganizationUrl(organizationName),
    projectName,
    personalAccessToken,
    buildPipelinePatterns: Object.freeze(buildPipelinePatterns),
    teamName,
  });
}

export function describeSettings(settings: Settings): string[] {
  const lines = [
    `Organization: ${settings.organizationUrl}`,
    `Project: ${settings.projectName}`,
    `PAT: ${censorPat(settings.personalAccessToken)}`,
  ];
  if (settings.teamName) {
    lines.push(`Team: ${settings.teamName}`);
  }
  return lines;
}
