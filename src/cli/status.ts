import type { ExecutionStatus } from "../orchestrator/types.js";
import { getLogLevel, setLogLevel } from "../utils/logger.js";
import { createOrchestrator, type CommonOptions } from "./shared.js";

/**
 * Print the status snapshot as JSON. Log lines are held back while it is
 * gathered so that stdout carries the JSON alone.
 */
export async function statusCommand(options: CommonOptions): Promise<void> {
  const orchestrator = await createOrchestrator(options);

  const level = getLogLevel();
  setLogLevel("silent");
  let status: ExecutionStatus;
  try {
    status = await orchestrator.getExecutionStatus();
  } finally {
    setLogLevel(level);
  }

  console.log(JSON.stringify(status, null, 2));
}
