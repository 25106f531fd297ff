import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { Logger, Settings } from "../src/types.ts";

export interface CapturedLogger {
  logger: Logger;
  log: string[];
  warn: string[];
  error: string[];
}

export function captureLogger(): CapturedLogger {
  const log: string[] = [];
  const warn: string[] = [];
  const error: string[] = [];

  return {
    logger: {
      log: (message?: unknown) => {
        log.push(String(message));
      },
      warn: (message?: unknown) => {
        warn.push(String(message));
      },
      error: (message?: unknown) => {
        error.push(String(message));
      },
    },
    log,
    warn,
    error,
  };
}

export function makeSettings(overrides: Partial<Settings> = {}): Settings {
  return {
    organizationName: "contoso",
    organizationUrl: "https://dev.azure.com/contoso",
    projectName: "Contoso",
    personalAccessToken: "test-secret-token",
    buildPipelinePatterns: [],
    ...overrides,
  };
}

export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), "azdo-tools-test-"));
}
