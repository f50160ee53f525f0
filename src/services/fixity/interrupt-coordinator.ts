/**
 * Interrupt Coordinator
 *
 * Turns the first SIGINT into a cooperative stop request. The handler is
 * registered with `once`, so after it fires no listener remains and a second
 * signal gets the platform default (immediate termination).
 */

import { logger as defaultLogger, type Logger } from '../../core/logger.js';

/**
 * Read-only view the walker polls at object boundaries
 */
export interface StopSignal {
  readonly stopRequested: boolean;
}

/**
 * The part of `process` the coordinator listens on
 */
export interface SignalSource {
  once(event: 'SIGINT', listener: () => void): unknown;
  removeListener(event: 'SIGINT', listener: () => void): unknown;
}

export type InterruptState = 'idle' | 'armed' | 'stopping';

export class InterruptCoordinator implements StopSignal {
  private state: InterruptState = 'idle';
  private readonly handler = (): void => this.requestStop();

  constructor(
    private readonly source: SignalSource = process,
    private readonly logger: Logger = defaultLogger
  ) {}

  get stopRequested(): boolean {
    return this.state === 'stopping';
  }

  getState(): InterruptState {
    return this.state;
  }

  arm(): void {
    if (this.state !== 'idle') return;
    this.source.once('SIGINT', this.handler);
    this.state = 'armed';
  }

  /**
   * Sets the stop flag; called by the signal handler or directly
   */
  requestStop(): void {
    if (this.state === 'stopping') return;
    if (this.state === 'armed') {
      // Covers direct calls; after a real signal `once` has already detached it.
      this.source.removeListener('SIGINT', this.handler);
    }
    this.state = 'stopping';
    this.logger.warn('Interrupt received: finishing the current object, then exiting. Interrupt again to exit immediately.');
  }

  disarm(): void {
    if (this.state === 'armed') {
      this.source.removeListener('SIGINT', this.handler);
      this.state = 'idle';
    }
  }
}
