import { z } from "zod";
import type { TestExecutionResult } from "./types.js";

const testCaseSchema = z.object({
  name: z.string(),
  feature: z.string().default(""),
  status: z.enum(["passed", "failed", "skipped"]),
  duration: z.number().nonnegative().default(0),
  error: z.string().optional(),
  screenshotPath: z.string().optional(),
});

const suiteResultSchema = z.object({
  name: z.string(),
  startTime: z.coerce.date(),
  endTime: z.coerce.date(),
  tests: z.array(testCaseSchema),
});

/**
 * Read the JSON the generated suite writes and total its outcomes.
 */
export function parseSuiteResults(content: string): TestExecutionResult {
  const parsed = suiteResultSchema.parse(JSON.parse(content));
  const count = (status: string) => parsed.tests.filter((test) => test.status === status).length;

  return Object.freeze({
    name: parsed.name,
    tests: parsed.tests,
    startTime: parsed.startTime,
    endTime: parsed.endTime,
    totalDuration: Math.max(0, parsed.endTime.getTime() - parsed.startTime.getTime()),
    passedCount: count("passed"),
    failedCount: count("failed"),
    skippedCount: count("skipped"),
  });
}
