import { describe, it, expect, vi } from 'vitest';
import { EventEmitter } from 'events';
import { installSignalGuard, SIGNAL_EXIT_CODES } from './signals.js';

function makeSource() {
  return new EventEmitter();
}

async function settle(): Promise<void> {
  await new Promise(resolve => setImmediate(resolve));
}

describe('installSignalGuard', () => {
  it('runs cleanup then exits with 128 + signal number', async () => {
    const source = makeSource();
    const exit = vi.fn();
    const order: string[] = [];
    const cleanup = vi.fn(async () => { order.push('cleanup'); });
    exit.mockImplementation(() => order.push('exit'));

    const guard = installSignalGuard(cleanup, { source, exit });
    source.emit('SIGINT');
    await settle();

    expect(guard.interrupted).toBe('SIGINT');
    expect(cleanup).toHaveBeenCalledWith('SIGINT', 130);
    expect(exit).toHaveBeenCalledWith(130);
    expect(order).toEqual(['cleanup', 'exit']);
  });

  it('maps each signal to its exit code', () => {
    expect(SIGNAL_EXIT_CODES).toEqual({ SIGINT: 130, SIGTERM: 143, SIGHUP: 129 });
  });

  it('ignores signals that arrive during cleanup', async () => {
    const source = makeSource();
    const exit = vi.fn();
    const cleanup = vi.fn(async () => {
      source.emit('SIGTERM');
    });

    const guard = installSignalGuard(cleanup, { source, exit });
    source.emit('SIGHUP');
    await settle();

    expect(cleanup).toHaveBeenCalledTimes(1);
    expect(guard.interrupted).toBe('SIGHUP');
    expect(exit).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(129);
  });

  it('still exits when cleanup fails', async () => {
    const source = makeSource();
    const exit = vi.fn();
    const onError = vi.fn();

    installSignalGuard(async () => { throw new Error('disk full'); }, { source, exit, onError });
    source.emit('SIGTERM');
    await settle();

    expect(onError).toHaveBeenCalledWith('Cleanup after SIGTERM failed: disk full');
    expect(exit).toHaveBeenCalledWith(143);
  });

  it('stops listening once disposed', async () => {
    const source = makeSource();
    const exit = vi.fn();
    const cleanup = vi.fn(async () => {});

    const guard = installSignalGuard(cleanup, { source, exit });
    expect(source.listenerCount('SIGINT')).toBe(1);

    guard.dispose();
    source.emit('SIGINT');
    await settle();

    expect(source.listenerCount('SIGINT')).toBe(0);
    expect(cleanup).not.toHaveBeenCalled();
    expect(guard.interrupted).toBeNull();
  });

  it('removes its listeners after handling a signal', async () => {
    const source = makeSource();
    installSignalGuard(async () => {}, { source, exit: vi.fn() });

    source.emit('SIGINT');
    await settle();

    expect(source.listenerCount('SIGINT')).toBe(0);
    expect(source.listenerCount('SIGTERM')).toBe(0);
    expect(source.listenerCount('SIGHUP')).toBe(0);
  });
});
