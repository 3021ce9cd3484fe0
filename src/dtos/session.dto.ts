import { ReplyTo } from "../interfaces/actor";

export interface ParkingSession {
  licensePlate: string;
  entryTimestamp: number;
  paid: boolean;
}

export interface PaymentStatus {
  licensePlate: string;
  paid: boolean;
  entryTimestamp: number;
  currentTimestamp: number;
  priceCents: number;
}

export interface SessionDeleted {
  licensePlate: string;
  status: 'deleted';
}

export type PaymentCommand =
  | { type: 'CarEntered'; licensePlate: string; entryTimestamp: number }
  | { type: 'Pay'; licensePlate: string; replyTo: ReplyTo<PaymentStatus> }
  | { type: 'CheckOnLeave'; licensePlate: string; replyTo: ReplyTo<PaymentStatus> }
  | { type: 'DeleteOnExit'; licensePlate: string; replyTo?: ReplyTo<SessionDeleted> };
