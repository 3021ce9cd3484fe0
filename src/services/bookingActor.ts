import { Actor } from "../infra/actor";
import { describeError } from "../infra/logger";
import { BookingAction, BookingCommand, BookingConfirmation } from "../dtos/booking.dto";
import { IEventPublisher } from "../interfaces/publisher";

export function bookingTopic(lotId: string): string {
  return `booking.${lotId}`;
}

/**
 * Relays book/cancel requests to the lot's edge node. Holds no reservation
 * state: no capacity check, no conflict detection.
 */
export class BookingActor extends Actor<BookingCommand> {
  constructor(private readonly publisher: IEventPublisher, askTimeoutMs?: number) {
    super('booking', askTimeoutMs);
  }

  protected receive(message: BookingCommand): void {
    switch (message.type) {
      case 'Book':
        message.replyTo(this.relay('book', message.lotId, message.licensePlate));
        return;
      case 'Cancel':
        message.replyTo(this.relay('cancel', message.lotId, message.licensePlate));
        return;
      default:
        this.unhandled(message);
    }
  }

  private relay(action: BookingAction, lotId: string, licensePlate: string): BookingConfirmation {
    const topic = bookingTopic(lotId);
    const onError = (err: unknown) => {
      this.log.error('Booking publish failed', { topic, action, licensePlate, error: describeError(err) });
    };

    try {
      const pending = this.publisher.publish(topic, { action, licensePlate });
      if (pending instanceof Promise) pending.catch(onError);
    } catch (err) {
      onError(err);
    }

    this.log.info('Booking relayed', { topic, action, licensePlate });
    return { lotId, licensePlate, status: action === 'book' ? 'queued' : 'canceled' };
  }
}
