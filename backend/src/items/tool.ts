/** Tool item -- runs a command as a child process over files from upstream items. */

import { spawn, type ChildProcess } from 'node:child_process';
import { ItemFinishState } from '../models/execution.js';
import { makeResource, type Resource } from '../models/resource.js';
import { ResourceBroker } from '../services/resourceBroker.js';
import { errorMessage } from '../utils/errors.js';
import type { ToolConfig } from '../utils/projectValidator.js';
import { BaseProjectItem, type ItemExecutionContext } from './base.js';

/** Environment variable carrying the resolved input files, JSON-encoded, to the command. */
export const INPUT_FILES_ENV = 'PIPEFLOW_INPUT_FILES';

const STDERR_TAIL = 500;

type ProcessOutcome =
  | { kind: 'exited'; code: number | null; stderr: string }
  | { kind: 'aborted' }
  | { kind: 'error'; message: string };

export type InputResolution =
  | { ok: true; files: string[] }
  | { ok: false; missing: string[] };

export class Tool extends BaseProjectItem {
  readonly kind = 'tool';
  command: string;
  args: string[];
  cwd?: string;
  inputFiles: string[];
  optionalInputFiles: string[];
  outputFiles: string[];
  private controller: AbortController | null = null;

  constructor(config: Omit<ToolConfig, 'kind'>) {
    super(config.name, config.description);
    this.command = config.command;
    this.args = [...(config.args ?? [])];
    this.cwd = config.cwd;
    this.inputFiles = [...(config.inputFiles ?? [])];
    this.optionalInputFiles = [...(config.optionalInputFiles ?? [])];
    this.outputFiles = [...(config.outputFiles ?? [])];
  }

  /** Match required and optional input patterns against upstream resources. */
  resolveInputs(inputs: Resource[]): InputResolution {
    const available = new ResourceBroker();
    for (const resource of inputs) available.publish(resource.producer, resource);

    const files: string[] = [];
    const missing: string[] = [];
    for (const pattern of this.inputFiles) {
      const hits = available.findPattern(pattern);
      if (hits.length === 0) missing.push(pattern);
      files.push(...hits.map((r) => r.locator));
    }
    for (const pattern of this.optionalInputFiles) {
      files.push(...available.findPattern(pattern).map((r) => r.locator));
    }
    if (missing.length > 0) return { ok: false, missing };
    return { ok: true, files: [...new Set(files)] };
  }

  async execute(context: ItemExecutionContext): Promise<ItemFinishState> {
    const resolved = this.resolveInputs(context.inputs);
    if (!resolved.ok) {
      context.logger.error('Tool input files missing', { item: this.name, missing: resolved.missing });
      return ItemFinishState.FAILED;
    }

    this.controller = new AbortController();
    const onAbort = () => this.controller?.abort();
    context.abortSignal.addEventListener('abort', onAbort, { once: true });
    if (context.abortSignal.aborted) this.controller.abort();

    context.logger.info('Tool starting', { item: this.name, command: this.command, args: this.args });
    try {
      const outcome = await this.run(resolved.files, this.controller.signal);
      if (outcome.kind === 'aborted') {
        context.logger.warn('Tool stopped', { item: this.name });
        return ItemFinishState.STOPPED;
      }
      if (outcome.kind === 'error') {
        context.logger.error('Tool could not start', { item: this.name, error: outcome.message });
        return ItemFinishState.FAILED;
      }
      if (outcome.code !== 0) {
        context.logger.error('Tool failed', { item: this.name, exitCode: outcome.code, stderr: outcome.stderr });
        return ItemFinishState.FAILED;
      }
      for (const resource of this.outputResourcesForward()) context.publish(resource);
      return ItemFinishState.CONTINUE;
    } finally {
      context.abortSignal.removeEventListener('abort', onAbort);
      this.controller = null;
    }
  }

  stopExecution(): void {
    this.controller?.abort();
  }

  outputResourcesForward(): Resource[] {
    return this.outputFiles.map((file) => makeResource(this.name, 'file', file, { is_output: true }));
  }

  private run(inputFiles: string[], signal: AbortSignal): Promise<ProcessOutcome> {
    return new Promise<ProcessOutcome>((resolve) => {
      let stderr = '';
      let proc: ChildProcess;
      try {
        proc = spawn(this.command, this.args, {
          cwd: this.cwd,
          stdio: ['ignore', 'ignore', 'pipe'],
          env: { ...process.env, [INPUT_FILES_ENV]: JSON.stringify(inputFiles) },
          signal,
        });
      } catch (err: unknown) {
        resolve({ kind: 'error', message: errorMessage(err) });
        return;
      }
      proc.stderr?.on('data', (chunk: Buffer) => {
        stderr = (stderr + chunk.toString()).slice(-STDERR_TAIL);
      });
      proc.on('error', (err) => {
        if (signal.aborted) {
          resolve({ kind: 'aborted' });
        } else {
          resolve({ kind: 'error', message: err.message });
        }
      });
      proc.on('close', (code) => {
        resolve(signal.aborted ? { kind: 'aborted' } : { kind: 'exited', code, stderr });
      });
    });
  }

  toJSON(): ToolConfig {
    return {
      kind: this.kind,
      name: this.name,
      ...(this.description !== undefined ? { description: this.description } : {}),
      command: this.command,
      ...(this.args.length > 0 ? { args: [...this.args] } : {}),
      ...(this.cwd !== undefined ? { cwd: this.cwd } : {}),
      ...(this.inputFiles.length > 0 ? { inputFiles: [...this.inputFiles] } : {}),
      ...(this.optionalInputFiles.length > 0 ? { optionalInputFiles: [...this.optionalInputFiles] } : {}),
      ...(this.outputFiles.length > 0 ? { outputFiles: [...this.outputFiles] } : {}),
    };
  }
}
