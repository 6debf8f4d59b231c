import { spawn } from 'child_process';
import { constants } from 'os';

import { ExecutionError } from '@retrykit/errors';

export interface CommandResult {
  /** Process exit code; 128 + signal number when killed by a signal */
  exitCode: number;
  signal: NodeJS.Signals | null;
}

/**
 * Runs one attempt of a command. Rejects only when the command cannot be started.
 */
export type CommandRunner = (command: string, args: readonly string[]) => Promise<CommandResult>;

/**
 * Spawn the command with inherited stdio and wait for it to exit
 */
export const spawnCommand: CommandRunner = (command, args) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: 'inherit' });

    child.on('error', error => {
      reject(
        new ExecutionError(`Failed to start ${command}: ${error.message}`, {
          code: 'SPAWN_FAILED',
          cause: error,
        })
      );
    });

    child.on('close', (code, signal) => {
      resolve({
        exitCode: code ?? 128 + (signal ? constants.signals[signal] : 0),
        signal,
      });
    });
  });
