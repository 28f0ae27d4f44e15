import { z } from "zod";
import { config } from "../config";
import { issueKinds } from "../types";
import type { CheckConfig, OrchestratorConfig } from "../types";

export const issueKindSchema = z.enum(issueKinds);

export const checkConfigSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1).optional(),
    kind: issueKindSchema,
    adapter: z.string().min(1).default("command"),
    enabled: z.boolean().default(true),
    filePatterns: z.array(z.string().min(1)).default([]),
    excludePatterns: z.array(z.string().min(1)).default([]),
    timeoutMs: z.number().int().min(1).max(3_600_000).default(120_000),
    stage: z.enum(["fast", "comprehensive"]).default("fast"),
    isFormatter: z.boolean().default(false),
    parallelSafe: z.boolean().default(true),
    retryOnFailure: z.boolean().default(false),
    settings: z.record(z.unknown()).default({})
  })
  .transform(
    (value): CheckConfig => ({
      ...value,
      name: value.name ?? value.id
    })
  );

export const commandFixerSettingsSchema = z.object({
  name: z.string().min(1),
  strategy: z.string().min(1).default("command"),
  command: z.string().min(1),
  kinds: z.array(issueKindSchema).min(1),
  confidence: z.number().min(0).max(1).default(0.8),
  timeoutMs: z.number().int().min(1).default(config.maxCommandRuntimeMs),
  requiresFile: z.boolean().default(true)
});

export const orchestratorConfigSchema = z
  .object({
    projectRoot: z.string().min(1),
    maxParallelChecks: z.number().int().min(1).max(64).default(4),
    enableCaching: z.boolean().default(true),
    cacheDirectory: z.string().min(1).optional(),
    failFast: z.boolean().default(false),
    runFormattersFirst: z.boolean().default(true),
    enableIncremental: z.boolean().default(false),
    verbose: z.boolean().default(false),
    maxFixIterations: z.number().int().min(1).max(50).default(5),
    maxFixMinutes: z.number().int().min(1).max(720).default(30),
    checks: z.array(checkConfigSchema),
    fixers: z.array(commandFixerSettingsSchema).default([])
  })
  .refine((value) => new Set(value.checks.map((check) => check.id)).size === value.checks.length, {
    message: "Check ids must be unique.",
    path: ["checks"]
  })
  .refine((value) => new Set(value.fixers.map((fixer) => fixer.name)).size === value.fixers.length, {
    message: "Fixer names must be unique.",
    path: ["fixers"]
  });

export const parseOrchestratorConfig = (input: unknown): OrchestratorConfig => orchestratorConfigSchema.parse(input);
