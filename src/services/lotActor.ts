import { Actor } from "../infra/actor";
import { LotCommand, LotState, LotStatus } from "../dtos/lot.dto";

export interface LotSeed {
  lotId: string;
  maxCapacity: number;
  latitude: number;
  longitude: number;
}

/**
 * Mirror of one lot as last reported by its edge source.
 *
 * Occupancy is replaced wholesale on every report, stale ones included: the
 * next report from the edge corrects it. Values above capacity are stored
 * as given.
 */
export class LotActor extends Actor<LotCommand> {
  private state: LotState;

  constructor(seed: LotSeed, askTimeoutMs?: number, now: () => number = Date.now) {
    super(`lot-${seed.lotId}`, askTimeoutMs);
    this.state = {
      ...seed,
      currentOccupancy: 0,
      lastUpdateTimestamp: now(),
      lastEdgeServerId: 'unknown',
    };
    this.log.info('Lot initialized', { lotId: seed.lotId, maxCapacity: seed.maxCapacity });
  }

  protected receive(message: LotCommand): void {
    switch (message.type) {
      case 'UpdateOccupancy':
        this.onUpdateOccupancy(message.currentOccupancy, message.timestamp, message.edgeServerId);
        return;
      case 'GetStatus':
        message.replyTo(this.status());
        return;
      default:
        this.unhandled(message);
    }
  }

  private onUpdateOccupancy(occupancy: number, timestamp: number, edgeServerId?: string): void {
    const s = this.state;
    s.currentOccupancy = occupancy;
    s.lastUpdateTimestamp = timestamp;
    if (edgeServerId) s.lastEdgeServerId = edgeServerId;

    if (occupancy > s.maxCapacity) {
      this.log.warn('Occupancy exceeds capacity, possible sensor error', {
        lotId: s.lotId,
        currentOccupancy: occupancy,
        maxCapacity: s.maxCapacity,
        edgeServerId: s.lastEdgeServerId,
      });
    } else if (occupancy < 0) {
      this.log.warn('Negative occupancy reported', { lotId: s.lotId, currentOccupancy: occupancy });
    }

    this.log.debug('Occupancy updated', {
      lotId: s.lotId,
      currentOccupancy: occupancy,
      maxCapacity: s.maxCapacity,
    });
  }

  private status(): LotStatus {
    const s = this.state;
    return {
      lotId: s.lotId,
      currentOccupancy: s.currentOccupancy,
      maxCapacity: s.maxCapacity,
      availableSpaces: s.maxCapacity - s.currentOccupancy,
      isFull: s.currentOccupancy >= s.maxCapacity,
      latitude: s.latitude,
      longitude: s.longitude,
      lastUpdateTimestamp: s.lastUpdateTimestamp,
    };
  }

  protected postStop(): void {
    this.log.info('Lot stopped', { lotId: this.state.lotId });
  }
}
