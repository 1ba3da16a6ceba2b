import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { installCommand } from '@/commands/install.js';
import { PathNotFoundError } from '@/lib/errors.js';
import { FakeLauncher, createTestContext, failedRun, makeTempDir, okRun, removeTempDir } from '../helpers/mocks.js';

describe('install command', () => {
  let root: string;
  let installer: string;
  let installedExe: string;

  beforeEach(async () => {
    root = await makeTempDir();
    installer = join(root, 'nvda_installer.exe');
    installedExe = join(root, 'install', 'nvda.exe');
    await writeFile(installer, 'MZ');
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  const installs = async () => {
    await mkdir(join(root, 'install'), { recursive: true });
    await writeFile(installedExe, 'MZ');
  };

  it('fails fast when the installer is missing', async () => {
    const { ctx, launcher } = await createTestContext(root);

    await expect(installCommand('missing.exe', ctx)).rejects.toThrow(PathNotFoundError);
    expect(launcher.runs).toEqual([]);
  });

  it('installs silently when the first strategy produces the executable', async () => {
    const launcher = new FakeLauncher(async () => {
      await installs();
      return okRun();
    });
    const { ctx } = await createTestContext(root, { launcher });

    const result = await installCommand('nvda_installer.exe', ctx);

    expect(result.success).toBe(true);
    expect(result.message).toBe(`Installed to ${join(root, 'install')}`);
    expect(result.details).toEqual({
      strategy: 'install-silent',
      install_dir: join(root, 'install'),
      executable: installedExe,
    });
    expect(launcher.runs).toEqual([{ executable: installer, args: ['--install-silent'] }]);
  });

  it('falls back to a normal install and stops the started process', async () => {
    const launcher = new FakeLauncher(async (_exe, args) => {
      if (args[0] === '--install-silent') return failedRun(1);
      await installs();
      return okRun();
    });
    const { ctx } = await createTestContext(root, { launcher });

    const result = await installCommand(installer, ctx);

    expect(result.success).toBe(true);
    expect(result.details?.strategy).toBe('install-then-stop');
    expect(launcher.killed).toEqual(['nvda.exe']);
    expect(result.diagnostics).toEqual([
      `install-silent: ExternalProcessError: Command failed (1): ${installer} --install-silent; ` +
        `verification 'installed-executable' failed: ${installedExe} does not exist`,
    ]);
  });

  it('reports exhaustion when the executable never appears', async () => {
    const launcher = new FakeLauncher(() => okRun());
    const { ctx } = await createTestContext(root, { launcher });

    const result = await installCommand(installer, ctx);

    expect(result.success).toBe(false);
    expect(result.error_kind).toBe('AllStrategiesExhausted');
    expect(result.diagnostics).toEqual([
      `install-silent: completed; verification 'installed-executable' failed: ${installedExe} does not exist`,
      `install-then-stop: completed; verification 'installed-executable' failed: ${installedExe} does not exist`,
    ]);
  });

  it('does not stop the process once the fallback install has timed out', async () => {
    const launcher = new FakeLauncher(async (_exe, args, options) => {
      if (args[0] === '--install-silent') return failedRun(1);
      await new Promise<void>((resolve) => options.signal?.addEventListener('abort', () => resolve()));
      return okRun();
    });
    const { ctx } = await createTestContext(root, { launcher, config: { timeouts: { install_seconds: 0.125 } } });

    const result = await installCommand(installer, ctx);

    expect(result.success).toBe(false);
    expect(launcher.events).toEqual(['run --install-silent', 'run --install']);
    expect(launcher.killed).toEqual([]);
    expect(result.diagnostics[1]).toBe(
      `install-then-stop: TimeoutExceeded after 125ms; verification 'installed-executable' failed: ${installedExe} does not exist`
    );
  });
});
