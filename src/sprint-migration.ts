import type { TeamContext } from "azure-devops-node-api/interfaces/CoreInterfaces";
import type { TeamSettingsIteration } from "azure-devops-node-api/interfaces/WorkInterfaces";
import { Operation } from "azure-devops-node-api/interfaces/common/VSSInterfaces";
import type { JsonPatchOperation } from "azure-devops-node-api/interfaces/common/VSSInterfaces";
import { SprintNotFoundError } from "./errors.ts";
import type {
  Logger,
  MigrationSummary,
  Settings,
  SprintApis,
  SprintIteration,
  WorkItemMoveFailure,
} from "./types.ts";

/** Upper bound on work item ids handled per batch by the work item APIs. */
export const MAX_BATCH_SIZE = 200;
export const FINISHED_STATES = ["Done", "Closed"] as const;
export const ITERATION_PATH_FIELD = "System.IterationPath";

export interface MigrationOptions {
  sourceSprintName: string;
  destinationSprintName: string;
  dryRun?: boolean;
}

export function escapeWiqlLiteral(value: string): string {
  return String(value).replaceAll("'", "''");
}

export function buildUnfinishedWorkItemsWiql(iterationPath: string): string {
  const stateClauses = FINISHED_STATES.map(
    (state) => `[System.State] <> '${escapeWiqlLiteral(state)}'`,
  );
  return `SELECT [System.Id] FROM WorkItems WHERE [${ITERATION_PATH_FIELD}] = '${escapeWiqlLiteral(iterationPath)}' AND ${stateClauses.join(" AND ")}`;
}

export function buildIterationPatch(iterationPath: string): JsonPatchOperation[] {
  return [{ op: Operation.Add, path: `/fields/${ITERATION_PATH_FIELD}`, value: iterationPath }];
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size <= 0) {
    throw new RangeError(`Batch size must be a positive integer, got ${size}.`);
  }

  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

function teamLabel(settings: Settings): string {
  return settings.teamName
    ? `team "${settings.teamName}"`
    : `the default team of project "${settings.projectName}"`;
}

export function findIteration(
  iterations: readonly TeamSettingsIteration[],
  sprintName: string,
  settings: Settings,
): SprintIteration {
  const match = iterations.find((iteration) => iteration.name === sprintName);
  if (!match?.path) {
    throw new SprintNotFoundError(sprintName, teamLabel(settings));
  }
  return { name: sprintName, path: match.path };
}

function teamContextOf(settings: Settings): TeamContext {
  return settings.teamName
    ? { project: settings.projectName, team: settings.teamName }
    : { project: settings.projectName };
}

export async function resolveSprints(
  apis: Pick<SprintApis, "workApi">,
  settings: Settings,
  options: MigrationOptions,
): Promise<{ source: SprintIteration; destination: SprintIteration }> {
  const iterations = await apis.workApi.getTeamIterations(teamContextOf(settings));
  return {
    source: findIteration(iterations, options.sourceSprintName, settings),
    destination: findIteration(iterations, options.destinationSprintName, settings),
  };
}

export async function queryUnfinishedWorkItemIds(
  apis: Pick<SprintApis, "witApi">,
  settings: Settings,
  iterationPath: string,
): Promise<number[]> {
  const result = await apis.witApi.queryByWiql(
    { query: buildUnfinishedWorkItemsWiql(iterationPath) },
    teamContextOf(settings),
  );

  const ids: number[] = [];
  for (const workItem of result.workItems ?? []) {
    if (workItem.id !== undefined) ids.push(workItem.id);
  }
  return ids;
}

export async function migrateSprintWorkItems(
  apis: SprintApis,
  settings: Settings,
  options: MigrationOptions,
  logger: Logger = console,
): Promise<MigrationSummary> {
  const { source, destination } = await resolveSprints(apis, settings, options);
  logger.log(`Source sprint: ${source.name} (${source.path})`);
  logger.log(`Destination sprint: ${destination.name} (${destination.path})`);

  const ids = await queryUnfinishedWorkItemIds(apis, settings, source.path);
  const summary: MigrationSummary = {
    source,
    destination,
    found: ids.length,
    moved: 0,
    batchSizes: [],
    failures: [],
    dryRun: options.dryRun === true,
  };

  if (ids.length === 0) {
    logger.log(`No unfinished work items found in ${source.path}.`);
    return summary;
  }

  logger.log(`Found ${ids.length} unfinished work items in ${source.path}.`);

  if (summary.dryRun) {
    logger.log(`Dry run: would move ${ids.join(", ")} to ${destination.path}.`);
    return summary;
  }

  const batches = chunk(ids, MAX_BATCH_SIZE);
  const patch = buildIterationPatch(destination.path);

  for (const [index, batch] of batches.entries()) {
    summary.batchSizes.push(batch.length);
    logger.log(`Batch ${index + 1}/${batches.length}: ${batch.length} work items`);

    for (const id of batch) {
      try {
        await apis.witApi.updateWorkItem({}, patch, id, settings.projectName);
        summary.moved += 1;
        logger.log(`Moved work item #${id} to ${destination.path}`);
      } catch (error) {
        const failure: WorkItemMoveFailure = {
          id,
          message: error instanceof Error ? error.message : String(error),
        };
        summary.failures.push(failure);
        logger.warn(`Warning: failed to move work item #${id}: ${failure.message}`);
      }
    }
  }

  logger.log(`Moved ${summary.moved} of ${summary.found} work items to ${destination.path}.`);
  return summary;
}
