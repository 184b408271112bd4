import { z } from 'zod';
import { scheduleSchema } from './schedule.js';

// Retry policy carried by a deployment onto the runs it creates
export const retryPolicySchema = z.object({
  maxRetries: z.number().int().min(0).max(100).default(0),
  retryDelaySeconds: z.number().min(0).max(86400).default(10),
  backoffMultiplier: z.number().min(1).max(10).default(1),
  maxRetryDelaySeconds: z.number().min(0).max(86400).default(3600),
});

export type RetryPolicyInput = z.input<typeof retryPolicySchema>;
export type RetryPolicy = z.infer<typeof retryPolicySchema>;

// Deployment definition (deployments file entry)
export const deploymentDefinitionSchema = z.object({
  name: z.string().trim().min(1).max(128),
  flowName: z.string().trim().min(1).max(128),
  schedule: scheduleSchema.optional(),
  isScheduleActive: z.boolean().default(true),
  tags: z.array(z.string().trim().min(1)).default([]),
  parameters: z.record(z.unknown()).default({}),
  retryPolicy: retryPolicySchema.default({}),
});

export type DeploymentDefinition = z.infer<typeof deploymentDefinitionSchema>;

// Concurrency limit definition
export const concurrencyLimitSchema = z.object({
  tag: z.string().trim().min(1),
  limit: z.number().int().min(0),
});

export type ConcurrencyLimitDefinition = z.infer<typeof concurrencyLimitSchema>;

// Deployments file
export const deploymentsFileSchema = z
  .object({
    deployments: z.array(deploymentDefinitionSchema).default([]),
    concurrencyLimits: z.array(concurrencyLimitSchema).default([]),
  })
  .superRefine((file, ctx) => {
    const seen = new Set<string>();
    file.deployments.forEach((deployment, index) => {
      if (seen.has(deployment.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['deployments', index, 'name'],
          message: `Duplicate deployment name: ${deployment.name}`,
        });
      }
      seen.add(deployment.name);
    });
  });

export type DeploymentsFile = z.infer<typeof deploymentsFileSchema>;
