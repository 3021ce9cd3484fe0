import { Actor } from "../infra/actor";
import { describeError } from "../infra/logger";
import { ActorRef } from "../interfaces/actor";
import { LotStatus, RegisteredLots, SupervisorCommand } from "../dtos/lot.dto";
import { NearbyLot, NearbyQuery, RoutingCommand } from "../dtos/routing.dto";
import { haversineMeters } from "./geo";

type NearbyRequest = Extract<RoutingCommand, { type: 'GetNearbyLots' }>;

/**
 * Nearest-lot search: registry snapshot from the supervisor, then one status
 * ask per lot, joined. If any ask fails or times out the reply is an empty
 * list, never a partial one.
 */
export class RoutingActor extends Actor<RoutingCommand> {
  constructor(private readonly supervisor: ActorRef<SupervisorCommand>, askTimeoutMs?: number) {
    super('routing', askTimeoutMs);
  }

  protected receive(message: RoutingCommand): void {
    switch (message.type) {
      case 'GetNearbyLots':
        this.onGetNearbyLots(message);
        return;
      case 'NearbyResolved':
        this.log.debug('Nearby search finished', { results: message.lots.length });
        message.replyTo(message.lots);
        return;
      default:
        this.unhandled(message);
    }
  }

  // the gather runs outside the mailbox; its result comes back as a message
  private onGetNearbyLots(request: NearbyRequest): void {
    this.log.debug('Finding nearby lots', { latitude: request.latitude, longitude: request.longitude });
    void this.gather(request).then(
      (lots) => this.tell({ type: 'NearbyResolved', lots, replyTo: request.replyTo }),
      (err: unknown) => {
        this.log.error('Nearby search failed, replying with no lots', { error: describeError(err) });
        this.tell({ type: 'NearbyResolved', lots: [], replyTo: request.replyTo });
      }
    );
  }

  private async gather(query: NearbyQuery): Promise<NearbyLot[]> {
    const registered = await this.supervisor.ask<RegisteredLots>(
      (replyTo) => ({ type: 'GetRegistered', replyTo }),
      this.askTimeoutMs
    );

    const statuses = await Promise.all(
      Object.keys(registered).map((lotId) =>
        this.supervisor.ask<LotStatus>(
          (replyTo) => ({ type: 'GetStatus', lotId, replyTo }),
          this.askTimeoutMs
        )
      )
    );

    const origin = { lat: query.latitude, lng: query.longitude };
    return statuses
      // deregistered between the snapshot and the status ask
      .filter((status) => status.maxCapacity > 0)
      .map((status) => toNearbyLot(status, haversineMeters(origin, { lat: status.latitude, lng: status.longitude })))
      .filter((lot) => !query.onlyAvailable || lot.availableSpaces > 0)
      .sort((a, b) => a.distanceMeters - b.distanceMeters)
      .slice(0, query.limit);
  }
}

function toNearbyLot(status: LotStatus, distanceMeters: number): NearbyLot {
  return {
    lotId: status.lotId,
    latitude: status.latitude,
    longitude: status.longitude,
    maxCapacity: status.maxCapacity,
    currentOccupancy: status.currentOccupancy,
    availableSpaces: status.availableSpaces,
    distanceMeters,
  };
}
