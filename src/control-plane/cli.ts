import { Command } from 'commander';
import { createSyncCommand, type SyncCommandDependencies } from './commands/sync.js';

/**
 * Package version
 */
const VERSION = '0.1.0';

/**
 * Create and configure the CLI program.
 */
export function createProgram(deps: SyncCommandDependencies = {}): Command {
  const program = new Command();

  program
    .name('branchsync')
    .description('Synchronize local working-tree changes into a branch and pull request, idempotently')
    .version(VERSION, '-v, --version', 'Output the current version');

  program.addCommand(createSyncCommand(deps), { isDefault: true });

  // Error handling
  program.exitOverride();

  return program;
}

/**
 * Run the CLI program.
 */
export async function runCli(args: string[] = process.argv, deps: SyncCommandDependencies = {}): Promise<void> {
  const program = createProgram(deps);

  try {
    await program.parseAsync(args);
  } catch (error) {
    // Commander throws an error on --help and --version
    if (
      error instanceof Error &&
      'code' in error &&
      (error.code === 'commander.helpDisplayed' || error.code === 'commander.version')
    ) {
      return;
    }

    throw error;
  }
}

export { createSyncCommand } from './commands/sync.js';
