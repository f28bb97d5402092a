/** Read and write project.json with validation and atomic writes. */

import fs from 'node:fs';
import path from 'node:path';
import { PROJECT_FILENAME } from './constants.js';
import { ProjectFileError, errorMessage } from './errors.js';
import { ProjectFileSchema, formatIssues, type ProjectFile } from './projectValidator.js';

export function projectFilePath(projectDir: string): string {
  return path.join(projectDir, PROJECT_FILENAME);
}

/** Validate parsed JSON as a project file. Throws ProjectFileError listing every issue. */
export function parseProjectFile(raw: unknown, source = 'project file'): ProjectFile {
  const parsed = ProjectFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ProjectFileError(`Invalid ${source}:\n  ${formatIssues(parsed.error).join('\n  ')}`);
  }
  return parsed.data;
}

export function readProjectFile(projectDir: string): ProjectFile {
  const filePath = projectFilePath(projectDir);
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (err: unknown) {
    throw new ProjectFileError(`Cannot read ${filePath}: ${errorMessage(err)}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err: unknown) {
    throw new ProjectFileError(`${filePath} is not valid JSON: ${errorMessage(err)}`);
  }
  return parseProjectFile(raw, filePath);
}

/** Persist using a temp file and rename so readers never see a partial file. */
export function writeProjectFile(projectDir: string, project: ProjectFile): void {
  fs.mkdirSync(projectDir, { recursive: true });
  const filePath = projectFilePath(projectDir);
  const tmpPath = filePath + '.tmp';
  fs.writeFileSync(tmpPath, JSON.stringify(project, null, 2) + '\n');
  fs.renameSync(tmpPath, filePath);
}
