import { describe, it, expect, vi, beforeEach, afterEach, type Mock, type MockInstance } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { InventoryReportLauncher } from './launcher';
import type { ProcessRunner } from './process-runner';
import { getLauncherConfig } from '../config/environment';
import { ProcessLaunchError } from '../types/errors';
import type { LauncherConfig } from '../types/launcher';
import {
  createProjectFixture,
  loggedEntries,
  ProjectFixture,
} from '../../tests/utils/project-fixtures';

/**
 * Test Suite: InventoryReportLauncher
 *
 * Runs the full bootstrap sequence against throwaway project roots. Most tests
 * swap the process runner for a mock to inspect what would be spawned; the
 * last group spawns a real /bin/sh stand-in for the venv interpreter.
 */
describe('InventoryReportLauncher', () => {
  let fixture: ProjectFixture;
  let config: LauncherConfig;
  let emptyBin: string;
  let runner: Mock<Parameters<ProcessRunner>, ReturnType<ProcessRunner>>;
  let infoSpy: MockInstance;
  let warnSpy: MockInstance;
  let errorSpy: MockInstance;

  const launcherFor = (baseEnv: NodeJS.ProcessEnv) =>
    new InventoryReportLauncher(config, {
      baseEnv,
      runner,
      platform: 'linux',
      correlationId: 'test-correlation',
    });

  beforeEach(() => {
    fixture = createProjectFixture();
    config = getLauncherConfig({ PROJECT_ROOT: fixture.root });
    emptyBin = fixture.mkdir('empty-bin');
    runner = vi.fn<Parameters<ProcessRunner>, ReturnType<ProcessRunner>>().mockResolvedValue(0);
    infoSpy = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fixture.cleanup();
  });

  describe('environment loading', () => {
    it('should export .env variables into the report process environment', async () => {
      const python = fixture.writeScript('.venv/bin/python', 'exit 0');
      fixture.writeFile('.env', 'INVENTORY_S3_BUCKET=inventory-test\nSMTP_PASSWORD=test-secret\n');

      await launcherFor({ PATH: emptyBin }).launch();

      expect(runner).toHaveBeenCalledTimes(1);
      const [command, args, options] = runner.mock.calls[0];
      expect(command).toBe(python);
      expect(args).toEqual([config.reportScriptPath]);
      expect(options.cwd).toBe(fixture.root);
      expect(options.env.INVENTORY_S3_BUCKET).toBe('inventory-test');
      expect(options.env.SMTP_PASSWORD).toBe('test-secret');
      expect(options.correlationId).toBe('test-correlation');
    });

    it('should warn and still launch when there is no .env file', async () => {
      fixture.writeScript('.venv/bin/python', 'exit 0');

      const result = await launcherFor({ PATH: emptyBin, AWS_REGION: 'us-east-1' }).launch();

      expect(result.invoked).toBe(true);
      expect(runner.mock.calls[0][2].env.AWS_REGION).toBe('us-east-1');
      expect(loggedEntries(warnSpy).map((entry) => entry.message)).toContain(
        '.env file not found. Ensure environment variables are set via crontab or system config.',
      );
    });

    it('should honour VENV_PATH set in the .env file', async () => {
      const python = fixture.writeScript('custom-venv/bin/python', 'exit 0');
      fixture.writeFile('.env', 'VENV_PATH=custom-venv\n');

      const result = await launcherFor({ PATH: emptyBin }).launch();

      expect(result.interpreter).toEqual({ path: python, source: 'unix-venv' });
    });

    it('should apply a LOG_LEVEL from the .env file to the whole run', async () => {
      fixture.writeScript('.venv/bin/python', 'exit 0');
      fixture.writeFile('.env', 'LOG_LEVEL=ERROR\n');

      const result = await launcherFor({ PATH: emptyBin }).launch();

      expect(result.exitCode).toBe(0);
      expect(infoSpy).not.toHaveBeenCalled();
      expect(runner.mock.calls[0][2].env.LOG_LEVEL).toBe('ERROR');
    });

    it('should leave the base environment untouched', async () => {
      fixture.writeScript('.venv/bin/python', 'exit 0');
      fixture.writeFile('.venv/bin/activate', '# activate');
      fixture.writeFile('.env', 'SMTP_SERVER=smtp.test\n');
      const baseEnv: NodeJS.ProcessEnv = { PATH: emptyBin };

      await launcherFor(baseEnv).launch();

      expect(baseEnv).toEqual({ PATH: emptyBin });
    });
  });

  describe('interpreter selection', () => {
    it('should launch the Windows-style venv interpreter ahead of all others', async () => {
      const windowsPython = fixture.writeFile('.venv/Scripts/python.exe', 'MZ');
      fixture.writeScript('.venv/bin/python', 'exit 0');
      fixture.writeScript('sysbin/python3', 'exit 0');

      const result = await launcherFor({ PATH: path.join(fixture.root, 'sysbin') }).launch();

      expect(result.interpreter).toEqual({ path: windowsPython, source: 'windows-venv' });
      expect(runner.mock.calls[0][0]).toBe(windowsPython);
    });

    it('should launch the system interpreter with a warning when no venv exists', async () => {
      const systemPython = fixture.writeScript('sysbin/python3', 'exit 0');

      const result = await launcherFor({ PATH: path.join(fixture.root, 'sysbin') }).launch();

      expect(result).toEqual({
        exitCode: 0,
        invoked: true,
        interpreter: { path: systemPython, source: 'system' },
      });
      expect(loggedEntries(warnSpy).map((entry) => entry.message)).toContain(
        `Virtual environment Python not found. Using system Python: ${systemPython}`,
      );
    });

    it('should exit non-zero without launching when no interpreter exists', async () => {
      const result = await launcherFor({ PATH: emptyBin }).launch();

      expect(result).toEqual({ exitCode: 1, invoked: false });
      expect(runner).not.toHaveBeenCalled();
      expect(loggedEntries(errorSpy)[0]).toMatchObject({
        level: 'ERROR',
        message: 'No Python interpreter found. Please install Python or set up virtual environment.',
        correlationId: 'test-correlation',
      });
    });

    it('should log the interpreter it is about to use', async () => {
      const python = fixture.writeScript('.venv/bin/python', 'exit 0');

      await launcherFor({ PATH: emptyBin }).launch();

      expect(loggedEntries(infoSpy).map((entry) => entry.message)).toEqual(
        expect.arrayContaining([
          `Using Python interpreter: ${python}`,
          'Executing inventory reporting pipeline',
        ]),
      );
    });
  });

  describe('venv activation', () => {
    it('should hand the activated environment to the report process', async () => {
      fixture.writeScript('.venv/bin/python', 'exit 0');
      fixture.writeFile('.venv/bin/activate', '# activate');

      await launcherFor({ PATH: emptyBin, PYTHONHOME: '/opt/python' }).launch();

      const { env } = runner.mock.calls[0][2];
      const venvPath = path.join(fixture.root, '.venv');
      expect(env.VIRTUAL_ENV).toBe(venvPath);
      expect(env.PATH).toBe(`${path.join(venvPath, 'bin')}:${emptyBin}`);
      expect(env.PYTHONHOME).toBeUndefined();
    });
  });

  describe('exit codes', () => {
    it('should return the exit code of the report process', async () => {
      fixture.writeScript('.venv/bin/python', 'exit 0');
      runner.mockResolvedValue(5);

      const result = await launcherFor({ PATH: emptyBin }).launch();

      expect(result.exitCode).toBe(5);
      expect(result.invoked).toBe(true);
    });

    it('should return the spawn failure exit code when the interpreter cannot start', async () => {
      const python = fixture.writeScript('.venv/bin/python', 'exit 0');
      runner.mockRejectedValue(
        new ProcessLaunchError('Failed to start', 'test-correlation', python, 127),
      );

      const result = await launcherFor({ PATH: emptyBin }).launch();

      expect(result).toEqual({
        exitCode: 127,
        invoked: true,
        interpreter: { path: python, source: 'unix-venv' },
      });
    });

    it('should propagate unexpected runner errors', async () => {
      fixture.writeScript('.venv/bin/python', 'exit 0');
      runner.mockRejectedValue(new Error('boom'));

      await expect(launcherFor({ PATH: emptyBin }).launch()).rejects.toThrow('boom');
    });
  });

  describe('with a real child process', () => {
    it('should run the report script from the project root and pass its exit code back', async () => {
      fixture.writeScript(
        '.venv/bin/python',
        [
          'printf \'%s\' "$INVENTORY_S3_BUCKET" > captured-bucket.txt',
          'printf \'%s\' "$1" > captured-script.txt',
          'exit 4',
        ].join('\n'),
      );
      fixture.writeFile('.env', 'INVENTORY_S3_BUCKET=inventory-test\n');

      const launcher = new InventoryReportLauncher(config, {
        baseEnv: { PATH: emptyBin },
        platform: 'linux',
      });
      const result = await launcher.launch();

      expect(result.exitCode).toBe(4);
      expect(fs.readFileSync(path.join(fixture.root, 'captured-bucket.txt'), 'utf-8')).toBe(
        'inventory-test',
      );
      expect(fs.readFileSync(path.join(fixture.root, 'captured-script.txt'), 'utf-8')).toBe(
        config.reportScriptPath,
      );
    });
  });
});
