import { WebApi, getPersonalAccessTokenHandler } from "azure-devops-node-api";
import type { PipelineApis, Settings, SprintApis } from "./types.ts";

export const AZURE_DEVOPS_HOST = "https://dev.azure.com";

export function encodePathSegment(value: string): string {
  return encodeURIComponent(value).replaceAll("%2F", "/");
}

export function buildOrganizationUrl(organization: string): string {
  if (/^https?:\/\//i.test(organization)) {
    return organization.replace(/\/+$/, "");
  }
  return `${AZURE_DEVOPS_HOST}/${encodePathSegment(organization)}`;
}

export function createConnection(settings: Settings): WebApi {
  const authHandler = getPersonalAccessTokenHandler(settings.personalAccessToken);
  return new WebApi(settings.organizationUrl, authHandler);
}

export async function connectPipelineApis(settings: Settings): Promise<PipelineApis> {
  const connection = createConnection(settings);
  return {
    buildApi: await connection.getBuildApi(),
    releaseApi: await connection.getReleaseApi(),
    taskAgentApi: await connection.getTaskAgentApi(),
  };
}

export async function connectSprintApis(settings: Settings): Promise<SprintApis> {
  const connection = createConnection(settings);
  return {
    workApi: await connection.getWorkApi(),
    witApi: await connection.getWorkItemTrackingApi(),
  };
}
