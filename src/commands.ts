import { connectPipelineApis, connectSprintApis } from "./api.ts";
import {
  AUDIT_USAGE,
  MIGRATION_USAGE,
  parseAuditArgs,
  parseMigrationArgs,
} from "./cli-args.ts";
import { describeSettings, getConfigFilePath, loadFileConfig, resolveSettings } from "./config.ts";
import { auditPipelines } from "./pipeline-audit.ts";
import { runWithEpilogue } from "./run.ts";
import { migrateSprintWorkItems } from "./sprint-migration.ts";
import type { CliSettings, Env, Logger, PipelineApis, Settings, SprintApis } from "./types.ts";

export interface CommandContext<TApis> {
  env: Env;
  cwd: string;
  logger: Logger;
  connect: (settings: Settings) => Promise<TApis>;
}

function loadSettings(cli: CliSettings, context: CommandContext<unknown>): Settings {
  const configPath = getConfigFilePath(context.cwd, cli.configPath);
  const file = loadFileConfig(configPath, context.logger, cli.configPath !== undefined);
  const settings = resolveSettings({ cli, file, env: context.env, configPath });

  for (const line of describeSettings(settings)) {
    context.logger.log(line);
  }
  return settings;
}

export function runAuditCommand(
  args: string[],
  context: CommandContext<PipelineApis> = {
    env: process.env,
    cwd: process.cwd(),
    logger: console,
    connect: connectPipelineApis,
  },
): Promise<number> {
  return runWithEpilogue(
    "Pipeline audit",
    async () => {
      const parsed = parseAuditArgs(args);
      if (parsed.help) {
        context.logger.log(AUDIT_USAGE);
        return;
      }

      const settings = loadSettings(parsed.settings, context);
      const apis = await context.connect(settings);
      await auditPipelines(apis, settings, context.logger);
    },
    context.logger,
  );
}

export function runMigrationCommand(
  args: string[],
  context: CommandContext<SprintApis> = {
    env: process.env,
    cwd: process.cwd(),
    logger: console,
    connect: connectSprintApis,
  },
): Promise<number> {
  return runWithEpilogue(
    "Sprint work item migration",
    async () => {
      const parsed = parseMigrationArgs(args);
      if (parsed.help) {
        context.logger.log(MIGRATION_USAGE);
        return;
      }

      const settings = loadSettings(parsed.settings, context);
      const apis = await context.connect(settings);
      await migrateSprintWorkItems(
        apis,
        settings,
        {
          sourceSprintName: parsed.sourceSprintName,
          destinationSprintName: parsed.destinationSprintName,
          dryRun: parsed.dryRun,
        },
        context.logger,
      );
    },
    context.logger,
  );
}
