import { ReplyTo } from "../interfaces/actor";

export interface NearbyLot {
  lotId: string;
  latitude: number;
  longitude: number;
  maxCapacity: number;
  currentOccupancy: number;
  availableSpaces: number;
  distanceMeters: number;
}

export interface NearbyQuery {
  latitude: number;
  longitude: number;
  limit: number;
  onlyAvailable: boolean;
}

export type RoutingCommand =
  | ({ type: 'GetNearbyLots'; replyTo: ReplyTo<NearbyLot[]> } & NearbyQuery)
  // gather outcome fed back into the mailbox before replying
  | { type: 'NearbyResolved'; lots: NearbyLot[]; replyTo: ReplyTo<NearbyLot[]> };
