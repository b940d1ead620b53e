import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('@feedyard/shared/Utils/logger.js', () => ({
  logger: {
    child: () => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }),
  },
}));

import { ShutdownCoordinator, signalExitCode, type Drainable } from '../../src/core/shutdown-coordinator.js';

describe('signalExitCode', () => {
  it('should add the signal number to 128', () => {
    expect(signalExitCode('SIGINT')).toBe(130);
    expect(signalExitCode('SIGTERM')).toBe(143);
  });
});

describe('ShutdownCoordinator', () => {
  let exit: ReturnType<typeof vi.fn>;
  let onExit: ReturnType<typeof vi.fn>;

  function coordinatorFor(target: Drainable): ShutdownCoordinator {
    return new ShutdownCoordinator(target, { graceMs: 1000, onExit, exit });
  }

  beforeEach(() => {
    exit = vi.fn();
    onExit = vi.fn();
  });

  it('should exit 0 once every worker stopped', async () => {
    const shutdown = vi.fn(async () => true);

    await coordinatorFor({ shutdown }).handle('SIGTERM');

    expect(shutdown).toHaveBeenCalledWith(1000);
    expect(onExit).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(0);
  });

  it('should exit with the signal code when the grace period runs out', async () => {
    await coordinatorFor({ shutdown: async () => false }).handle('SIGTERM');
    expect(exit).toHaveBeenCalledWith(143);
  });

  it('should exit with the signal code when draining throws', async () => {
    await coordinatorFor({
      shutdown: async () => {
        throw new Error('runtime unreachable');
      },
    }).handle('SIGINT');

    expect(exit).toHaveBeenCalledWith(130);
    expect(onExit).toHaveBeenCalledTimes(1);
  });

  it('should force exit on a second signal and exit only once', async () => {
    let finishDrain: (clean: boolean) => void = () => {};
    const target: Drainable = {
      shutdown: () => new Promise<boolean>((resolve) => {
        finishDrain = resolve;
      }),
    };
    const coordinator = coordinatorFor(target);

    const draining = coordinator.handle('SIGTERM');
    void coordinator.handle('SIGINT');
    expect(exit).toHaveBeenCalledWith(130);

    finishDrain(true);
    await draining;

    expect(exit).toHaveBeenCalledTimes(1);
    expect(onExit).toHaveBeenCalledTimes(1);
  });

  it('should still exit when cleanup throws', async () => {
    onExit.mockImplementation(() => {
      throw new Error('lock already gone');
    });

    await coordinatorFor({ shutdown: async () => true }).handle('SIGTERM');

    expect(exit).toHaveBeenCalledWith(0);
  });

  it('should add and remove its signal listeners', () => {
    const before = process.listenerCount('SIGTERM');
    const coordinator = coordinatorFor({ shutdown: async () => true });

    coordinator.install();
    expect(process.listenerCount('SIGTERM')).toBe(before + 1);
    expect(process.listenerCount('SIGINT')).toBeGreaterThan(0);

    coordinator.uninstall();
    expect(process.listenerCount('SIGTERM')).toBe(before);
  });
});
