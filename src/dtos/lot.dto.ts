import { ReplyTo } from "../interfaces/actor";

export interface LotState {
  lotId: string;
  maxCapacity: number;
  currentOccupancy: number;
  latitude: number;
  longitude: number;
  lastUpdateTimestamp: number;
  lastEdgeServerId: string;
}

export interface LotStatus {
  lotId: string;
  currentOccupancy: number;
  maxCapacity: number;
  availableSpaces: number;
  isFull: boolean;
  latitude: number;
  longitude: number;
  lastUpdateTimestamp: number;
}

/** lotId -> maxCapacity */
export type RegisteredLots = Record<string, number>;

export interface LotRegistered {
  lotId: string;
  maxCapacity: number;
  status: 'registered';
}

export interface LotDeregistered {
  lotId: string;
  status: 'deregistered';
}

export interface OccupancyReport {
  lotId: string;
  currentOccupancy: number;
  timestamp: number;
  edgeServerId?: string;
}

// Messages understood by a single lot
export type LotCommand =
  | { type: 'UpdateOccupancy'; currentOccupancy: number; timestamp: number; edgeServerId?: string }
  | { type: 'GetStatus'; replyTo: ReplyTo<LotStatus> };

// Messages understood by the supervisor
export type SupervisorCommand =
  | {
      type: 'Register';
      lotId: string;
      maxCapacity: number;
      latitude: number;
      longitude: number;
      replyTo?: ReplyTo<LotRegistered>;
    }
  | { type: 'Deregister'; lotId: string; replyTo?: ReplyTo<LotDeregistered> }
  | ({ type: 'UpdateOccupancy' } & OccupancyReport)
  | { type: 'GetStatus'; lotId: string; replyTo: ReplyTo<LotStatus> }
  | { type: 'GetRegistered'; replyTo: ReplyTo<RegisteredLots> };

/** Reply for a lot id the supervisor does not know. Callers test `maxCapacity === 0`. */
export function notFoundStatus(lotId: string): LotStatus {
  return {
    lotId,
    currentOccupancy: 0,
    maxCapacity: 0,
    availableSpaces: 0,
    isFull: false,
    latitude: 0,
    longitude: 0,
    lastUpdateTimestamp: 0,
  };
}
