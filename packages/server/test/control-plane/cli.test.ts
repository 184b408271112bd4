import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { fileURLToPath } from 'node:url';
import { createProgram, runCli } from '../../src/control-plane/cli.js';
import { resetConfig } from '../../src/config/index.js';

const fixturePath = fileURLToPath(new URL('../fixtures/deployments.yaml', import.meta.url));

interface TickOutput {
  scheduler: { deploymentsScanned: number; runsCreated: number; deploymentsFailed: number };
  lateRuns: { runsFound: number; runsMarkedLate: number };
  runs: Array<{ name: string; state: string; expectedStartTime: string | null }>;
}

interface PreviewOutput {
  deployment: string;
  isScheduleActive: boolean;
  occurrences: string[];
}

function cli(...args: string[]): Promise<void> {
  return runCli(['node', 'runplane', ...args]);
}

describe('CLI', () => {
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  function printed(): string {
    return logSpy.mock.calls.map((call) => String(call[0])).join('\n');
  }

  beforeEach(() => {
    resetConfig();
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    resetConfig();
  });

  it('should register the top-level commands', () => {
    expect(createProgram().commands.map((command) => command.name())).toEqual(['serve', 'schedule', 'tick']);
  });

  describe('tick', () => {
    it('should schedule active deployments and report as JSON', async () => {
      await cli('tick', '-d', fixturePath, '--json');

      const output: TickOutput = JSON.parse(printed());
      expect(output.scheduler).toEqual({ deploymentsScanned: 2, runsCreated: 200, deploymentsFailed: 0 });
      expect(output.lateRuns).toMatchObject({ runsFound: 0, runsMarkedLate: 0 });
      expect(output.runs).toHaveLength(200);
      expect(new Set(output.runs.map((run) => run.state))).toEqual(new Set(['Scheduled']));
      expect(output.runs.some((run) => run.name.startsWith('paused-sync-'))).toBe(false);
      expect(process.exitCode).toBeUndefined();
    });

    it('should fail when the deployments file is missing', async () => {
      const missing = fileURLToPath(new URL('../fixtures/missing.yaml', import.meta.url));

      await cli('tick', '-d', missing);

      expect(process.exitCode).toBe(1);
      expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining(`Deployments file not found: ${missing}`));
    });
  });

  describe('schedule preview', () => {
    it('should list upcoming occurrences as JSON', async () => {
      await cli('schedule', 'preview', '-d', fixturePath, '--name', 'hourly-report', '-n', '3', '--json');

      const output: PreviewOutput = JSON.parse(printed());
      expect(output.deployment).toBe('hourly-report');
      expect(output.isScheduleActive).toBe(true);
      expect(output.occurrences).toHaveLength(3);

      const times = output.occurrences.map((iso) => new Date(iso).getTime());
      expect(times.every((time) => time % 3_600_000 === 0)).toBe(true);
      expect(times.slice(1).map((time, index) => time - (times[index] ?? 0))).toEqual([3_600_000, 3_600_000]);
    });

    it('should preview inactive schedules', async () => {
      await cli('schedule', 'preview', '-d', fixturePath, '--name', 'paused-sync', '-n', '1', '--json');

      const output: PreviewOutput = JSON.parse(printed());
      expect(output.isScheduleActive).toBe(false);
      expect(output.occurrences).toHaveLength(1);
    });

    it('should fail for an unknown deployment', async () => {
      await cli('schedule', 'preview', '-d', fixturePath, '--name', 'nope');

      expect(process.exitCode).toBe(1);
      expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('Deployment not found: nope'));
      expect(logSpy).not.toHaveBeenCalled();
    });
  });
});
