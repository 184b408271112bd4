/**
 * Deployments File Loader
 *
 * Loads a YAML file of deployments and concurrency limits, validates it and
 * seeds a store with it.
 *
 * @module control-plane/deployments-file
 */

import * as fs from 'node:fs/promises';
import * as YAML from 'yaml';
import type { ZodError } from 'zod';
import { deploymentsFileSchema, type DeploymentsFile } from '@runplane/shared';
import type { OrchestrationStore } from '../storage/store.js';
import type { Deployment } from '../types/index.js';
import { InvalidScheduleError, validateSchedule } from '../schedules/index.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('deployments-file');

export type DeploymentFileErrorReason = 'not-found' | 'parse' | 'validation';

/**
 * Error thrown when a deployments file cannot be used
 */
export class DeploymentFileError extends Error {
  constructor(
    public readonly filePath: string,
    public readonly reason: DeploymentFileErrorReason,
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'DeploymentFileError';
  }
}

function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

/**
 * Parse and validate the text of a deployments file.
 */
export function parseDeploymentsFile(content: string, filePath: string): DeploymentsFile {
  let parsed: unknown;
  try {
    parsed = YAML.parse(content);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new DeploymentFileError(filePath, 'parse', `Failed to parse YAML in ${filePath}: ${detail}`);
  }

  // An empty document declares nothing
  const result = deploymentsFileSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issues = formatZodIssues(result.error);
    throw new DeploymentFileError(
      filePath,
      'validation',
      `Deployments file validation failed for ${filePath}:\n${issues.map((i) => `  - ${i}`).join('\n')}`,
      issues
    );
  }

  const scheduleIssues: string[] = [];
  result.data.deployments.forEach((deployment, index) => {
    if (!deployment.schedule) {
      return;
    }
    try {
      validateSchedule(deployment.schedule);
    } catch (err) {
      if (!(err instanceof InvalidScheduleError)) {
        throw err;
      }
      scheduleIssues.push(`deployments.${index}.schedule: ${err.message}`);
    }
  });
  if (scheduleIssues.length > 0) {
    throw new DeploymentFileError(
      filePath,
      'validation',
      `Deployments file validation failed for ${filePath}:\n${scheduleIssues.map((i) => `  - ${i}`).join('\n')}`,
      scheduleIssues
    );
  }

  return result.data;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

/**
 * Load a deployments file from disk.
 */
export async function loadDeploymentsFile(filePath: string): Promise<DeploymentsFile> {
  logger.debug({ filePath }, 'Loading deployments file');

  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      throw new DeploymentFileError(filePath, 'not-found', `Deployments file not found: ${filePath}`);
    }
    throw err;
  }

  const file = parseDeploymentsFile(content, filePath);
  logger.debug(
    { filePath, deployments: file.deployments.length, concurrencyLimits: file.concurrencyLimits.length },
    'Deployments file loaded'
  );
  return file;
}

/**
 * Register a file's concurrency limits and deployments in a store.
 */
export async function seedStore(store: OrchestrationStore, file: DeploymentsFile): Promise<Deployment[]> {
  for (const limit of file.concurrencyLimits) {
    await store.setConcurrencyLimit(limit.tag, limit.limit);
  }
  const deployments: Deployment[] = [];
  for (const definition of file.deployments) {
    deployments.push(await store.createDeployment(definition));
  }
  logger.info(
    { deployments: deployments.length, concurrencyLimits: file.concurrencyLimits.length },
    'Store seeded'
  );
  return deployments;
}
