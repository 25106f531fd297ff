import type { BuildDefinitionReference } from "azure-devops-node-api/interfaces/BuildInterfaces";
import {
  DeployPhaseTypes,
  ReleaseDefinitionExpands,
} from "azure-devops-node-api/interfaces/ReleaseInterfaces";
import type {
  AgentBasedDeployPhase,
  DeployPhase,
  ReleaseDefinition,
  ReleaseDefinitionEnvironment,
} from "azure-devops-node-api/interfaces/ReleaseInterfaces";
import type { TaskAgentQueue } from "azure-devops-node-api/interfaces/TaskAgentInterfaces";
import { filterByPatterns } from "./pattern-filter.ts";
import type {
  BuildAuditEntry,
  BuildAuditResult,
  Logger,
  PipelineApis,
  PoolStatus,
  ReleaseAuditEntry,
  Settings,
} from "./types.ts";

const UNNAMED = "(unnamed)";

export function describeBuildPool(definition: BuildDefinitionReference): PoolStatus {
  const poolName = definition.queue?.pool?.name || definition.queue?.name;
  return poolName ? { kind: "pool", poolName } : { kind: "missing-pool" };
}

export function auditBuildDefinitions(
  definitions: readonly BuildDefinitionReference[],
  patterns: readonly string[],
): BuildAuditResult {
  const { included, matched, filterActive } = filterByPatterns(
    definitions,
    patterns,
    (definition) => definition.name ?? "",
  );

  return {
    entries: included.map((definition) => ({
      definitionName: definition.name ?? UNNAMED,
      status: describeBuildPool(definition),
    })),
    fetched: definitions.length,
    matched,
    filterActive,
  };
}

export function isAgentBasedPhase(phase: DeployPhase): phase is AgentBasedDeployPhase {
  return phase.phaseType === DeployPhaseTypes.AgentBasedDeployment;
}

export function buildQueuePoolMap(queues: readonly TaskAgentQueue[]): Map<number, string> {
  const pools = new Map<number, string>();
  for (const queue of queues) {
    const poolName = queue.pool?.name || queue.name;
    if (queue.id !== undefined && poolName) {
      pools.set(queue.id, poolName);
    }
  }
  return pools;
}

export function describeStagePool(
  stage: ReleaseDefinitionEnvironment,
  queuePools: ReadonlyMap<number, string>,
): PoolStatus {
  const agentPhase = (stage.deployPhases ?? []).find(isAgentBasedPhase);
  if (!agentPhase) {
    return { kind: "no-agent-jobs" };
  }

  const queueId = agentPhase.deploymentInput?.queueId;
  if (!queueId) {
    return { kind: "missing-pool" };
  }
  return { kind: "pool", poolName: queuePools.get(queueId) ?? `queue #${queueId}` };
}

export function auditReleaseDefinitions(
  definitions: readonly ReleaseDefinition[],
  queuePools: ReadonlyMap<number, string>,
): ReleaseAuditEntry[] {
  return definitions.flatMap((definition) =>
    (definition.environments ?? []).map((stage) => ({
      definitionName: definition.name ?? UNNAMED,
      stageName: stage.name ?? UNNAMED,
      status: describeStagePool(stage, queuePools),
    })),
  );
}

export function formatPoolStatus(status: PoolStatus): string {
  switch (status.kind) {
    case "pool":
      return status.poolName;
    case "missing-pool":
      return "no pool configured";
    case "no-agent-jobs":
      return "no agent-based jobs";
  }
}

export function formatBuildEntry(entry: BuildAuditEntry): string {
  return `${entry.definitionName}: ${formatPoolStatus(entry.status)}`;
}

export function formatReleaseEntry(entry: ReleaseAuditEntry): string {
  return `${entry.definitionName} / ${entry.stageName}: ${formatPoolStatus(entry.status)}`;
}

export async function auditBuildPipelines(
  apis: Pick<PipelineApis, "buildApi">,
  settings: Settings,
  logger: Logger = console,
): Promise<BuildAuditResult> {
  const definitions = await apis.buildApi.getDefinitions(
    settings.projectName,
    undefined,
    undefined,
    undefined,
    undefined,
    undefined,
    undefined,
    undefined,
    undefined,
    undefined,
    undefined,
    undefined,
    true,
  );

  const result = auditBuildDefinitions(definitions, settings.buildPipelinePatterns);

  logger.log("Build pipelines");
  logger.log("---------------");
  for (const entry of result.entries) {
    logger.log(formatBuildEntry(entry));
  }

  if (result.filterActive) {
    logger.log(
      `${result.matched} of ${result.fetched} build pipelines matched: ${settings.buildPipelinePatterns.join(", ")}`,
    );
    if (result.matched === 0) {
      logger.warn("Warning: no build pipelines matched the configured patterns.");
    }
  } else {
    logger.log(`${result.fetched} build pipelines audited.`);
  }

  return result;
}

export async function auditReleasePipelines(
  apis: Pick<PipelineApis, "releaseApi" | "taskAgentApi">,
  settings: Settings,
  logger: Logger = console,
): Promise<ReleaseAuditEntry[]> {
  const definitions = await apis.releaseApi.getReleaseDefinitions(
    settings.projectName,
    undefined,
    ReleaseDefinitionExpands.Environments,
  );
  const queues = await apis.taskAgentApi.getAgentQueues(settings.projectName);
  const entries = auditReleaseDefinitions(definitions, buildQueuePoolMap(queues));

  logger.log("Release pipelines");
  logger.log("-----------------");
  for (const entry of entries) {
    logger.log(formatReleaseEntry(entry));
  }
  logger.log(`${definitions.length} release pipelines audited.`);

  return entries;
}

export async function auditPipelines(
  apis: PipelineApis,
  settings: Settings,
  logger: Logger = console,
): Promise<void> {
  await auditBuildPipelines(apis, settings, logger);
  logger.log("");
  await auditReleasePipelines(apis, settings, logger);
}
