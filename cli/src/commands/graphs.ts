import path from 'node:path';
import type { GraphExportResult } from '../../../backend/src/services/project.js';
import { formatEdges } from '../../../backend/src/services/projectScheduler.js';
import { openProject } from '../projectLoader.js';
import type { Writer } from './run.js';

export interface OrderOptions {
  project?: string;
  json?: boolean;
}

export interface ExportOptions {
  project?: string;
  output?: string;
}

/** Print each graph's execution order, or the edges that keep it from running. */
export function showOrder(options: OrderOptions, write: Writer): void {
  const project = openProject({ project: options.project });
  const { graphs } = project.snapshot();
  if (options.json) {
    write(JSON.stringify(graphs.map(({ order, cycleEdges }) => ({ order, cycleEdges })), null, 2) + '\n');
    return;
  }
  graphs.forEach((graph, i) => {
    if (graph.order) {
      write(`Graph ${i}: ${graph.order.join(' -> ')}\n`);
    } else {
      write(`Graph ${i}: not a DAG (remove one of: ${formatEdges(graph.cycleEdges)})\n`);
    }
  });
}

/** Write `<index>.graphml` for each acyclic graph. */
export function exportGraphs(options: ExportOptions, write: Writer): GraphExportResult[] {
  const project = openProject({ project: options.project });
  const outputDir = path.resolve(options.output ?? project.projectDir ?? process.cwd());
  const results = project.exportGraphs(outputDir);
  if (results.length === 0) {
    write('Project has no graphs to export\n');
  }
  for (const result of results) {
    write(
      result.exported
        ? `Graph ${result.index} exported to ${result.path}\n`
        : `Graph ${result.index} skipped: not a directed acyclic graph\n`,
    );
  }
  if (results.some((r) => !r.exported)) process.exitCode = 1;
  return results;
}
