import execa from 'execa';
import { TaskLaunchError, errorMessage } from './errors';
import { CatalogSource, ExecutionRequest, SelectableItem } from './types';

/**
 * Scripts always go through `<manager> run <name>` so the manager sets up PATH
 * and lifecycle hooks; the script text is only shown, never executed directly.
 */
export function toExecutionRequest(
  source: Pick<CatalogSource, 'workingDirectory' | 'manager'>,
  item: SelectableItem,
): ExecutionRequest {
  const args = item.kind === 'command' ? item.id.split(/\s+/) : ['run', item.name];
  return {
    cwd: source.workingDirectory,
    manager: source.manager,
    args,
    command: [source.manager, ...args].join(' '),
  };
}

/**
 * Runs the request with inherited stdio and resolves to the task's exit code.
 * Rejects only when the manager could not be launched at all.
 */
export async function runTask(request: ExecutionRequest): Promise<number> {
  try {
    const result = await execa(request.manager, request.args, {
      cwd: request.cwd,
      stdio: 'inherit',
    });
    return result.exitCode;
  } catch (error: unknown) {
    if (error instanceof Error && 'exitCode' in error && typeof error.exitCode === 'number') {
      return error.exitCode;
    }
    if (error instanceof Error && 'signal' in error && typeof error.signal === 'string') {
      return 1;
    }
    throw new TaskLaunchError(
      `Failed to run "${request.command}" in ${request.cwd}: ${errorMessage(error)}`,
      { cause: error },
    );
  }
}
