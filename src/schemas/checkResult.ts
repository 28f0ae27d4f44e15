import { z } from "zod";
import { issueKindSchema } from "./orchestratorConfig";

export const severitySchema = z.enum(["low", "medium", "high", "critical"]);

export const findingSchema = z.object({
  filePath: z.string().optional(),
  lineNumber: z.number().int().optional(),
  column: z.number().int().optional(),
  code: z.string().optional(),
  message: z.string(),
  severity: severitySchema.optional()
});

export const checkResultSchema = z.object({
  checkId: z.string().min(1),
  checkName: z.string(),
  kind: issueKindSchema,
  stage: z.enum(["fast", "comprehensive"]),
  status: z.enum(["success", "failure", "warning", "skipped", "error"]),
  message: z.string(),
  filesChecked: z.array(z.string()),
  filesModified: z.array(z.string()),
  issuesFound: z.number().int().nonnegative(),
  issuesFixed: z.number().int().nonnegative(),
  executionTimeMs: z.number().nonnegative(),
  findings: z.array(findingSchema),
  output: z.string().optional()
});

export const persistedCacheEntrySchema = z.object({
  key: z.string().min(1),
  expiresAt: z.number(),
  result: checkResultSchema
});
