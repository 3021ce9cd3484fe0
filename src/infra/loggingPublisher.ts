import { BookingEvent } from "../dtos/booking.dto";
import { IEventPublisher } from "../interfaces/publisher";
import { createLogger } from "./logger";

const log = createLogger('publisher');

/** Default publisher when no bus is wired in: logs each event and keeps nothing. */
export class LoggingEventPublisher implements IEventPublisher {
  publish(topic: string, event: BookingEvent): void {
    log.info('Booking event', { topic, action: event.action, licensePlate: event.licensePlate });
  }
}
