import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EventEmitter } from 'events';
import { InterruptCoordinator } from './interrupt-coordinator.js';
import { Logger, LogLevel } from '../../core/logger.js';

describe('InterruptCoordinator', () => {
  let source: EventEmitter;
  let log: Logger;
  let coordinator: InterruptCoordinator;

  beforeEach(() => {
    source = new EventEmitter();
    log = new Logger({ level: LogLevel.SILENT });
    coordinator = new InterruptCoordinator(source, log);
  });

  it('should not request a stop before any signal', () => {
    coordinator.arm();
    expect(coordinator.stopRequested).toBe(false);
    expect(coordinator.getState()).toBe('armed');
    expect(source.listenerCount('SIGINT')).toBe(1);
  });

  it('should request a stop on the first signal and detach itself', () => {
    const warn = vi.spyOn(log, 'warn');
    coordinator.arm();

    source.emit('SIGINT');

    expect(coordinator.stopRequested).toBe(true);
    expect(coordinator.getState()).toBe('stopping');
    expect(source.listenerCount('SIGINT')).toBe(0);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should leave a second signal to the default handler', () => {
    const warn = vi.spyOn(log, 'warn');
    coordinator.arm();

    source.emit('SIGINT');
    const handled = source.emit('SIGINT');

    expect(handled).toBe(false);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should arm only once', () => {
    coordinator.arm();
    coordinator.arm();
    expect(source.listenerCount('SIGINT')).toBe(1);
  });

  it('should detach when a stop is requested directly', () => {
    coordinator.arm();
    coordinator.requestStop();
    expect(coordinator.stopRequested).toBe(true);
    expect(source.listenerCount('SIGINT')).toBe(0);
  });

  it('should detach on disarm without requesting a stop', () => {
    coordinator.arm();
    coordinator.disarm();
    expect(coordinator.stopRequested).toBe(false);
    expect(coordinator.getState()).toBe('idle');
    expect(source.listenerCount('SIGINT')).toBe(0);
  });
});
