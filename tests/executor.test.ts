import execa from 'execa';
import { TaskLaunchError } from '../src/errors';
import { runTask, toExecutionRequest } from '../src/executor';

jest.mock('execa', () => jest.fn());

const mockedExeca = execa as unknown as jest.Mock;
const source = { workingDirectory: '/proj', manager: 'yarn' };

describe('Executor', () => {
  afterEach(() => {
    mockedExeca.mockReset();
  });

  describe('toExecutionRequest', () => {
    test('runs fixed commands as manager subcommands', () => {
      const request = toExecutionRequest(source, {
        kind: 'command',
        id: 'install',
        description: 'Install packages',
      });
      expect(request).toEqual({
        cwd: '/proj',
        manager: 'yarn',
        args: ['install'],
        command: 'yarn install',
      });
    });

    test('runs scripts through the run subcommand, never the raw text', () => {
      const request = toExecutionRequest(source, {
        kind: 'script',
        name: 'build',
        command: 'tsc -p . && rm -rf tmp',
      });
      expect(request).toEqual({
        cwd: '/proj',
        manager: 'yarn',
        args: ['run', 'build'],
        command: 'yarn run build',
      });
    });

    test('splits multi-word fixed commands into arguments', () => {
      const request = toExecutionRequest(
        { workingDirectory: '/proj', manager: 'npm' },
        { kind: 'command', id: 'audit  fix', description: '' },
      );
      expect(request.args).toEqual(['audit', 'fix']);
      expect(request.command).toBe('npm audit fix');
    });
  });

  describe('runTask', () => {
    const request = { cwd: '/proj', manager: 'yarn', args: ['run', 'build'], command: 'yarn run build' };

    test('spawns the manager in the manifest directory', async () => {
      mockedExeca.mockResolvedValue({ exitCode: 0 });

      await expect(runTask(request)).resolves.toBe(0);
      expect(mockedExeca).toHaveBeenCalledWith('yarn', ['run', 'build'], {
        cwd: '/proj',
        stdio: 'inherit',
      });
    });

    test('resolves to the exit code of a failing task', async () => {
      mockedExeca.mockRejectedValue(Object.assign(new Error('Command failed'), { exitCode: 3 }));
      await expect(runTask(request)).resolves.toBe(3);
    });

    test('resolves to 1 when the task is killed by a signal', async () => {
      mockedExeca.mockRejectedValue(Object.assign(new Error('Command was killed'), { signal: 'SIGTERM' }));
      await expect(runTask(request)).resolves.toBe(1);
    });

    test('rejects when the manager cannot be launched', async () => {
      mockedExeca.mockRejectedValue(Object.assign(new Error('spawn yarn ENOENT'), { code: 'ENOENT' }));

      const promise = runTask(request);
      await expect(promise).rejects.toBeInstanceOf(TaskLaunchError);
      await expect(promise).rejects.toThrow(
        'Failed to run "yarn run build" in /proj: spawn yarn ENOENT',
      );
    });
  });
});
