import { z } from "zod";
import { issueKindSchema } from "./orchestratorConfig";

export const fixStrategyRecordSchema = z.object({
  issueKind: issueKindSchema,
  errorCode: z.string().nullable().default(null),
  issueMessage: z.string().default(""),
  filePath: z.string().nullable().default(null),
  embedding: z.array(z.number().finite()).min(1),
  agentUsed: z.string().min(1),
  strategy: z.string().min(1),
  success: z.boolean(),
  confidence: z.number().min(0).max(1),
  timestamp: z.string().min(1),
  sessionId: z.string().nullable().default(null)
});
