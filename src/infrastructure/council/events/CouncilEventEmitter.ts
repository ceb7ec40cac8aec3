import { EventEmitter } from 'events';
import { injectable } from 'inversify';
import { CouncilEvent } from '../../../domain/events/CouncilEvent';
import { logger, errorMessage } from '../../logging/Logger';

export type CouncilEventListener = (event: CouncilEvent) => void;

const COUNCIL_EVENT = 'council-event';
const MAX_RETAINED_EVENTS = 500;

@injectable()
export class CouncilEventEmitter extends EventEmitter {
  private recentEvents: CouncilEvent[] = [];

  constructor() {
    super();
    this.setMaxListeners(50); // one per connected stream client
  }

  /**
   * Publishes a pipeline event to every subscriber and keeps it in the
   * bounded replay buffer
   */
  publish(event: CouncilEvent): void {
    this.recentEvents.push(event);
    if (this.recentEvents.length > MAX_RETAINED_EVENTS) {
      this.recentEvents.splice(0, this.recentEvents.length - MAX_RETAINED_EVENTS);
    }

    try {
      this.emit(COUNCIL_EVENT, event);
      this.emit(`${COUNCIL_EVENT}:${event.type}`, event);
    } catch (error) {
      // Listener errors are logged, never rethrown into the pipeline
      logger.error('Council event listener failed', {
        type: event.type,
        error: errorMessage(error)
      });
    }

    logger.debug('Council event published', {
      type: event.type,
      iterationNumber: event.iterationNumber,
      listenersCount: this.listenerCount(COUNCIL_EVENT)
    });
  }

  /**
   * Registers a listener for all council events; returns the unsubscribe function
   */
  subscribe(listener: CouncilEventListener): () => void {
    this.on(COUNCIL_EVENT, listener);
    return () => {
      this.off(COUNCIL_EVENT, listener);
    };
  }

  getRecentEvents(limit?: number): CouncilEvent[] {
    if (limit === undefined) {
      return [...this.recentEvents];
    }
    return limit > 0 ? this.recentEvents.slice(-limit) : [];
  }

  /**
   * Drops buffered events older than maxAgeMs
   */
  cleanup(maxAgeMs: number): void {
    const cutoff = Date.now() - maxAgeMs;
    const before = this.recentEvents.length;
    this.recentEvents = this.recentEvents.filter(event => event.timestamp.getTime() >= cutoff);
    logger.debug('Council event buffer cleaned', { removed: before - this.recentEvents.length });
  }
}
