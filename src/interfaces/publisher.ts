import { BookingEvent } from "../dtos/booking.dto";

/**
 * Boundary to the message bus that carries booking events to edge nodes.
 * Delivery is not awaited by the core.
 */
export interface IEventPublisher {
  publish(topic: string, event: BookingEvent): void | Promise<void>;
}
