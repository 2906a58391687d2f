import { describe, it, expect, vi } from 'vitest';
import { runMonitor } from '../src/bot.js';

vi.mock('../src/utils/logger.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../src/utils/logger.js')>();
  return {
    ...actual,
    createLogger: () => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }),
  };
});

function createFakes() {
  const monitor = { start: vi.fn(async (_signal?: AbortSignal) => {}) };
  const client = { destroy: vi.fn(async () => {}) };
  return { monitor, client };
}

describe('runMonitor', () => {
  it('does not start the monitor after a shutdown requested before ready', async () => {
    const { monitor, client } = createFakes();
    const controller = new AbortController();
    controller.abort();

    await runMonitor(monitor, client, controller.signal);

    expect(monitor.start).not.toHaveBeenCalled();
    expect(client.destroy).toHaveBeenCalledTimes(1);
  });

  it('passes the shutdown signal to the monitor', async () => {
    const { monitor, client } = createFakes();
    const controller = new AbortController();

    await runMonitor(monitor, client, controller.signal);

    expect(monitor.start).toHaveBeenCalledWith(controller.signal);
    expect(client.destroy).toHaveBeenCalledTimes(1);
  });

  it('destroys the client when the monitor fails', async () => {
    const { monitor, client } = createFakes();
    monitor.start.mockRejectedValueOnce(new Error('boom'));

    await expect(runMonitor(monitor, client, new AbortController().signal)).rejects.toThrow('boom');
    expect(client.destroy).toHaveBeenCalledTimes(1);
  });
});
