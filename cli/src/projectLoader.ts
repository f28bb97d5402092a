/** Opens a project directory for a CLI command. */

import path from 'node:path';
import { Project } from '../../backend/src/services/project.js';
import type { SendEvent } from '../../backend/src/models/execution.js';
import { ProjectLogger, isLogLevel, type LogLevel } from '../../backend/src/utils/projectLogger.js';

export interface ProjectLoaderOptions {
  project?: string;
  logLevel?: string;
  /** Echo log lines to the console. */
  console?: boolean;
  send?: SendEvent;
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) return undefined;
  if (!isLogLevel(value)) {
    throw new Error(`Invalid --log-level value: "${value}". Use debug, info, warn or error.`);
  }
  return value;
}

export function openProject(options: ProjectLoaderOptions): Project {
  const projectDir = path.resolve(options.project ?? process.cwd());
  const level = parseLogLevel(options.logLevel ?? process.env.PIPEFLOW_LOG_LEVEL);
  const logger = ProjectLogger.forProject(projectDir, {
    ...(level ? { level } : {}),
    console: options.console ?? false,
  });
  return Project.load(projectDir, { logger, send: options.send });
}
