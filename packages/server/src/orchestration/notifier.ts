/**
 * Fan-out of committed transitions to in-process listeners.
 */

import { EventEmitter } from 'node:events';
import type { State } from '../types/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('transition-notifier');

/**
 * A transition that has been committed.
 */
export interface TransitionEvent {
  runId: string;
  runName: string;
  fromState: State;
  toState: State;
}

export type TransitionListener = (event: TransitionEvent) => void;

export class TransitionNotifier extends EventEmitter {
  /**
   * Subscribe to committed transitions. Returns an unsubscribe function.
   */
  onTransition(listener: TransitionListener): () => void {
    this.on('transition', listener);
    return () => {
      this.off('transition', listener);
    };
  }

  /**
   * Deliver an event to every listener. A throwing listener is logged and
   * does not stop delivery to the others.
   */
  publish(event: TransitionEvent): void {
    for (const listener of this.listeners('transition')) {
      try {
        Reflect.apply(listener, this, [event]);
      } catch (error) {
        log.error({ err: error, runId: event.runId }, 'Transition listener failed');
      }
    }
  }
}
