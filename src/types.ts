import type { IBuildApi } from "azure-devops-node-api/BuildApi";
import type { IReleaseApi } from "azure-devops-node-api/ReleaseApi";
import type { ITaskAgentApi } from "azure-devops-node-api/TaskAgentApi";
import type { IWorkApi } from "azure-devops-node-api/WorkApi";
import type { IWorkItemTrackingApi } from "azure-devops-node-api/WorkItemTrackingApi";

export interface Settings {
  readonly organizationName: string;
  readonly organizationUrl: string;
  readonly projectName: string;
  readonly personalAccessToken: string;
  readonly buildPipelinePatterns: readonly string[];
  readonly teamName?: string;
}

export interface FileConfig {
  organizationName?: string;
  projectName?: string;
  pat?: string;
  buildPipelinePatterns?: string[];
  teamName?: string;
}

/** `empty` means the flag was given without patterns: the filter is off. */
export type PatternListArg =
  | { kind: "unset" }
  | { kind: "empty" }
  | { kind: "provided"; patterns: string[] };

export interface CliSettings {
  organizationName?: string;
  projectName?: string;
  pat?: string;
  buildPipelinePatterns: PatternListArg;
  teamName?: string;
  configPath?: string;
}

export interface AuditArgs {
  help: boolean;
  settings: CliSettings;
}

export interface MigrationArgs {
  help: boolean;
  settings: CliSettings;
  sourceSprintName: string;
  destinationSprintName: string;
  dryRun: boolean;
}

export interface ParsedOptions {
  options: Record<string, string | boolean>;
  positionals: string[];
}

export type Logger = Pick<Console, "log" | "warn" | "error">;

export type Env = Record<string, string | undefined>;

export interface PipelineApis {
  buildApi: Pick<IBuildApi, "getDefinitions">;
  releaseApi: Pick<IReleaseApi, "getReleaseDefinitions">;
  taskAgentApi: Pick<ITaskAgentApi, "getAgentQueues">;
}

export interface SprintApis {
  workApi: Pick<IWorkApi, "getTeamIterations">;
  witApi: Pick<IWorkItemTrackingApi, "queryByWiql" | "updateWorkItem">;
}

export type PoolStatus =
  | { kind: "pool"; poolName: string }
  | { kind: "missing-pool" }
  | { kind: "no-agent-jobs" };

export interface BuildAuditEntry {
  definitionName: string;
  status: PoolStatus;
}

export interface BuildAuditResult {
  entries: BuildAuditEntry[];
  fetched: number;
  matched: number;
  filterActive: boolean;
}

export interface ReleaseAuditEntry {
  definitionName: string;
  stageName: string;
  status: PoolStatus;
}

export interface SprintIteration {
  name: string;
  path: string;
}

export interface WorkItemMoveFailure {
  id: number;
  message: string;
}

export interface MigrationSummary {
  source: SprintIteration;
  destination: SprintIteration;
  found: number;
  moved: number;
  batchSizes: number[];
  failures: WorkItemMoveFailure[];
  dryRun: boolean;
}
