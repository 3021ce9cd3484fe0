import { BookingEvent } from "../dtos/booking.dto";
import { IEventPublisher } from "../interfaces/publisher";
import { createLogger } from "./logger";

const log = createLogger('publisher');

export interface PublishedEvent {
  topic: string;
  event: BookingEvent;
}

/** Keeps published events in memory, in publish order. */
export class InMemoryEventPublisher implements IEventPublisher {
  private published: PublishedEvent[] = [];

  publish(topic: string, event: BookingEvent): void {
    this.published.push({ topic, event });
    log.debug('Published event', { topic, action: event.action });
  }

  listByTopic(topic: string): BookingEvent[] {
    return this.published.filter(p => p.topic === topic).map(p => p.event);
  }

  all(): PublishedEvent[] {
    return this.published.slice();
  }
}
