#!/usr/bin/env node

import { Command } from 'commander';

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('pipeflow')
    .description('Compose project items into workflow graphs and execute them')
    .version('0.1.0');

  program
    .command('run')
    .description('Execute every graph, or only the graphs touched by --select')
    .option('--project <dir>', 'Project directory containing project.json')
    .option('--select <name>', 'Execute only this item (repeatable)', collect)
    .option('--stream', 'Stream events to stdout as NDJSON')
    .option('--json', 'Output final result as JSON')
    .option('--log-level <level>', 'Minimum log level: debug, info, warn, error')
    .action(async (options) => {
      const { runProject } = await import('./commands/run.js');
      await runProject(options);
    });

  program
    .command('order')
    .description('Print the execution order of each graph')
    .option('--project <dir>', 'Project directory containing project.json')
    .option('--json', 'Output as JSON')
    .action(async (options) => {
      const { showOrder } = await import('./commands/graphs.js');
      showOrder(options, (text) => process.stdout.write(text));
    });

  program
    .command('export')
    .description('Export acyclic graphs to GraphML files')
    .option('--project <dir>', 'Project directory containing project.json')
    .option('--output <dir>', 'Output directory (defaults to the project directory)')
    .action(async (options) => {
      const { exportGraphs } = await import('./commands/graphs.js');
      exportGraphs(options, (text) => process.stdout.write(text));
    });

  program
    .command('serve')
    .description('Serve the project over HTTP with a WebSocket event stream')
    .option('--project <dir>', 'Project directory containing project.json')
    .option('--port <port>', 'Port to listen on')
    .option('--log-level <level>', 'Minimum log level: debug, info, warn, error')
    .action(async (options) => {
      const { serveProject } = await import('./commands/serve.js');
      await serveProject(options);
    });

  return program;
}

const isDirectRun = process.argv[1]?.endsWith('cli.js') || process.argv[1]?.endsWith('cli.ts');
if (isDirectRun) {
  createProgram()
    .parseAsync()
    .catch((err: unknown) => {
      console.error(err instanceof Error ? err.message : String(err));
      process.exit(1);
    });
}
