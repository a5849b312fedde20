import { createOrchestrator, type CommonOptions } from "./shared.js";

export async function quickCommand(
  url: string,
  options: CommonOptions & { aiModel?: string }
): Promise<void> {
  const orchestrator = await createOrchestrator(options);
  const passed = await orchestrator.quickTest(url, options.aiModel);
  if (!passed) {
    process.exitCode = 1;
  }
}
