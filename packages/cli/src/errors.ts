import { ExecutionError } from '@retrykit/errors';

/**
 * A command attempt exited with a non-zero code
 */
export class CommandFailedError extends ExecutionError {
  constructor(
    public readonly commandLine: string,
    public readonly exitCode: number
  ) {
    super(`command '${commandLine}' exited with code ${exitCode}`, {
      code: 'COMMAND_FAILED',
      data: { exitCode },
    });
  }
}
