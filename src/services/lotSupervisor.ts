import { Actor } from "../infra/actor";
import { InMemoryLotRegistry } from "../infra/inMemoryRepos";
import { OccupancyReport, SupervisorCommand, notFoundStatus } from "../dtos/lot.dto";
import { LotActor } from "./lotActor";

type RegisterMessage = Extract<SupervisorCommand, { type: 'Register' }>;
type DeregisterMessage = Extract<SupervisorCommand, { type: 'Deregister' }>;
type LotStatusQuery = Extract<SupervisorCommand, { type: 'GetStatus' }>;

/**
 * Root of the lot hierarchy. Owns the registry, creates one LotActor per lot
 * id on first registration and routes lot-scoped messages to it.
 */
export class LotSupervisor extends Actor<SupervisorCommand> {
  private readonly registry = new InMemoryLotRegistry();

  constructor(askTimeoutMs?: number, private readonly now: () => number = Date.now) {
    super('lot-supervisor', askTimeoutMs);
  }

  protected receive(message: SupervisorCommand): void {
    switch (message.type) {
      case 'Register':
        this.onRegister(message);
        return;
      case 'Deregister':
        this.onDeregister(message);
        return;
      case 'UpdateOccupancy':
        this.onUpdateOccupancy(message);
        return;
      case 'GetStatus':
        this.onGetStatus(message);
        return;
      case 'GetRegistered':
        this.log.debug('Returning registered lots', { count: this.registry.size });
        message.replyTo(this.registry.snapshot());
        return;
      default:
        this.unhandled(message);
    }
  }

  private onRegister(message: RegisterMessage): void {
    const { lotId, maxCapacity } = message;
    const existing = this.registry.findById(lotId);
    if (existing) {
      // capacity and coordinates are fixed by the first registration
      this.log.warn('Lot already registered', {
        lotId,
        maxCapacity: existing.maxCapacity,
        requestedCapacity: maxCapacity,
      });
      message.replyTo?.({ lotId, maxCapacity: existing.maxCapacity, status: 'registered' });
      return;
    }

    const ref = new LotActor(
      { lotId, maxCapacity, latitude: message.latitude, longitude: message.longitude },
      this.askTimeoutMs,
      this.now
    );
    this.registry.add(lotId, { ref, maxCapacity });
    this.log.info('Registered lot', { lotId, maxCapacity });
    message.replyTo?.({ lotId, maxCapacity, status: 'registered' });
  }

  private onDeregister(message: DeregisterMessage): void {
    const removed = this.registry.remove(message.lotId);
    if (removed) {
      removed.ref.stop();
      this.log.info('Deregistered lot', { lotId: message.lotId });
    } else {
      this.log.debug('Deregister for unknown lot', { lotId: message.lotId });
    }
    message.replyTo?.({ lotId: message.lotId, status: 'deregistered' });
  }

  private onUpdateOccupancy(report: OccupancyReport): void {
    const entry = this.registry.findById(report.lotId);
    if (!entry) {
      this.log.warn('Lot not found for occupancy update', { lotId: report.lotId });
      return;
    }
    entry.ref.tell({
      type: 'UpdateOccupancy',
      currentOccupancy: report.currentOccupancy,
      timestamp: report.timestamp,
      edgeServerId: report.edgeServerId,
    });
  }

  private onGetStatus(message: LotStatusQuery): void {
    const entry = this.registry.findById(message.lotId);
    if (!entry) {
      this.log.warn('Lot not found for status query', { lotId: message.lotId });
      message.replyTo(notFoundStatus(message.lotId));
      return;
    }
    // the lot replies to the original asker directly
    entry.ref.tell({ type: 'GetStatus', replyTo: message.replyTo });
  }

  protected postStop(): void {
    for (const { ref } of this.registry.all()) ref.stop();
  }
}
