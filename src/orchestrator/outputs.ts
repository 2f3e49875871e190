import { appendFile } from 'node:fs/promises';
import { nanoid } from 'nanoid';
import type { RunOutputs } from '../types/sync.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('outputs');

/**
 * Output name → value, in the order they are written
 */
export function toOutputRecord(outputs: RunOutputs): Record<string, string> {
  return {
    'pull-request-number': outputs.pullRequestNumber === undefined ? '' : String(outputs.pullRequestNumber),
    'pull-request-url': outputs.pullRequestUrl ?? '',
    'pull-request-operation': outputs.pullRequestOperation,
    'pull-request-head-sha': outputs.pullRequestHeadSha ?? '',
    'pull-request-branch': outputs.pullRequestBranch ?? '',
    'pull-request-commits-verified': String(outputs.pullRequestCommitsVerified),
  };
}

/**
 * Heredoc entry for the runner's output file
 */
export function formatOutput(name: string, value: string, delimiter: string): string {
  if (name.includes(delimiter) || value.includes(delimiter)) {
    throw new Error(`Output delimiter '${delimiter}' occurs in output '${name}'`);
  }
  return `${name}<<${delimiter}\n${value}\n${delimiter}\n`;
}

/**
 * Append outputs to $GITHUB_OUTPUT, or log them when it is not set
 */
export async function writeOutputs(
  outputs: RunOutputs,
  env: NodeJS.ProcessEnv = process.env,
  delimiter: () => string = () => `ghadelimiter_${nanoid()}`
): Promise<Record<string, string>> {
  const record = toOutputRecord(outputs);
  const outputFile = env.GITHUB_OUTPUT;

  if (!outputFile) {
    log.info({ outputs: record }, 'Run outputs');
    return record;
  }

  const content = Object.entries(record)
    .map(([name, value]) => formatOutput(name, value, delimiter()))
    .join('');
  await appendFile(outputFile, content, 'utf8');
  log.debug({ file: outputFile, names: Object.keys(record) }, 'Wrote outputs');
  return record;
}
