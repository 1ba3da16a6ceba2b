import { describe, it, expect } from 'vitest';
import { parsePgrepOutput, parseTasklistCsv, runOrThrow } from '@/lib/process.js';
import { ExternalProcessError, TimeoutExceededError } from '@/lib/errors.js';
import { FakeLauncher, failedRun, okRun, timedOutRun } from '../helpers/mocks.js';

describe('parseTasklistCsv', () => {
  it('collects pids for the image name, case-insensitively', () => {
    const output = [
      '"nvda.exe","4242","Console","1","52,000 K"',
      '"explorer.exe","1000","Console","1","90,000 K"',
      '"NVDA.EXE","4343","Console","1","12,000 K"',
    ].join('\r\n');

    expect(parseTasklistCsv(output, 'nvda.exe')).toEqual([4242, 4343]);
  });

  it('returns nothing for the "no tasks" message', () => {
    expect(parseTasklistCsv('INFO: No tasks are running which match the specified criteria.', 'nvda.exe')).toEqual(
      []
    );
  });
});

describe('parsePgrepOutput', () => {
  it('reads one pid per line', () => {
    expect(parsePgrepOutput('12\n  34 \n\nnoise\n')).toEqual([12, 34]);
  });
});

describe('runOrThrow', () => {
  it('returns trimmed stdout and stderr of a successful run', async () => {
    const launcher = new FakeLauncher(() => ({ ...okRun(' installed \n'), stderr: 'warning\n' }));

    await expect(runOrThrow(launcher, 'setup.exe', ['--install-silent'])).resolves.toBe('installed\nwarning');
    expect(launcher.runs).toEqual([{ executable: 'setup.exe', args: ['--install-silent'] }]);
  });

  it('throws ExternalProcessError with the exit code and stderr', async () => {
    const launcher = new FakeLauncher(() => failedRun(3, 'access denied\n'));

    const error = await runOrThrow(launcher, 'tar', ['-xf', 'a.nvda-addon']).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExternalProcessError);
    expect(error).toMatchObject({
      message: 'Command failed (3): tar -xf a.nvda-addon (access denied)',
      command: 'tar -xf a.nvda-addon',
      exitCode: 3,
      stderr: 'access denied',
      kind: 'ExternalProcessError',
    });
  });

  it('throws TimeoutExceededError when the run timed out', async () => {
    const launcher = new FakeLauncher(() => timedOutRun());

    const error = await runOrThrow(launcher, 'setup.exe', [], { timeout_ms: 5000 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TimeoutExceededError);
    expect(error).toMatchObject({ message: 'Command timed out after 5000ms: setup.exe', timeoutMs: 5000 });
  });
});
