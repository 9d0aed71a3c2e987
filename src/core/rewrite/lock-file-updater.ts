import type { Command } from 'commander';
import type { ApplicationFactory } from '../ports/host.js';
import { LOCK_UPDATE_ARGS } from '../../constants/index.js';
import { LockUpdateError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * Subcommands copy exit handling from their parent only when they are
 * created, so the override has to be applied to the whole tree.
 */
function disableAutoExit(command: Command): void {
  command.exitOverride();
  for (const sub of command.commands) {
    disableAutoExit(sub);
  }
}

/**
 * Run the host's own "update --lock --no-scripts" against workingDir, in
 * process. The host application must not exit the process when it finishes
 * or fails; failures surface as LockUpdateError.
 */
export async function runLockOnlyUpdate(createApplication: ApplicationFactory, workingDir: string): Promise<void> {
  const application = createApplication();
  disableAutoExit(application);

  const args = [...LOCK_UPDATE_ARGS, '--working-dir', workingDir];
  logger.debug(`Updating lock file: ${args.join(' ')}`);

  try {
    await application.parseAsync(args, { from: 'user' });
  } catch (error) {
    throw new LockUpdateError(workingDir, error);
  }
}
