import { formatError } from "./errors.ts";
import type { Logger } from "./types.ts";

/**
 * Runs a command body, printing any fatal error and always printing the
 * "finished" trailer. Resolves to the process exit code.
 */
export async function runWithEpilogue(
  label: string,
  body: () => Promise<void>,
  logger: Logger = console,
): Promise<number> {
  try {
    await body();
    return 0;
  } catch (error) {
    logger.error(formatError(error));
    return 1;
  } finally {
    logger.log(`${label} finished.`);
  }
}
