import { openProject } from '../projectLoader.js';
import { collectSummary, formatHumanReadable, formatNdjsonLine, isSuccessful, type RunSummary } from '../eventStream.js';

export interface RunOptions {
  project?: string;
  select?: string[];
  stream?: boolean;
  json?: boolean;
  logLevel?: string;
}

export type Writer = (text: string) => void;

const stdoutWriter: Writer = (text) => {
  process.stdout.write(text);
};

/** Execute the project's graphs. Ctrl+C stops the running item. */
export async function runProject(options: RunOptions, write: Writer = stdoutWriter): Promise<RunSummary> {
  const summary = collectSummary();
  const project = openProject({
    project: options.project,
    logLevel: options.logLevel,
    send: async (event) => {
      summary.push(event);
      if (options.stream) {
        write(formatNdjsonLine(event));
      } else if (!options.json) {
        write(formatHumanReadable(event) + '\n');
      }
    },
  });

  const onSigint = () => {
    project.stop();
  };
  process.once('SIGINT', onSigint);
  try {
    if (options.select && options.select.length > 0) {
      await project.executeSelected(options.select);
    } else {
      await project.executeAll();
    }
  } finally {
    process.removeListener('SIGINT', onSigint);
  }

  const result = summary.getSummary();
  if (options.json) {
    const { itemsExecuted, itemsFailed, itemsSkipped, outcomes } = result;
    write(JSON.stringify({ itemsExecuted, itemsFailed, itemsSkipped, outcomes }, null, 2) + '\n');
  }
  if (!isSuccessful(result.outcomes)) process.exitCode = 1;
  return result;
}
