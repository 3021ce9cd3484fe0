import { ReplyTo } from "../interfaces/actor";

export type BookingAction = 'book' | 'cancel';

export interface BookingConfirmation {
  lotId: string;
  licensePlate: string;
  status: 'queued' | 'canceled';
}

/** Payload published for the lot's edge node. */
export interface BookingEvent {
  action: BookingAction;
  licensePlate: string;
}

export type BookingCommand =
  | { type: 'Book'; lotId: string; licensePlate: string; replyTo: ReplyTo<BookingConfirmation> }
  | { type: 'Cancel'; lotId: string; licensePlate: string; replyTo: ReplyTo<BookingConfirmation> };
