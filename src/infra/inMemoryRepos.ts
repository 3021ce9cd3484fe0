import { ParkingSession } from "../dtos/session.dto";
import { RegisteredLots } from "../dtos/lot.dto";
import type { LotActor } from "../services/lotActor";

export interface RegistryEntry {
  ref: LotActor;
  maxCapacity: number;
}

/** lotId -> lot handle. Owned by the supervisor and never handed out. */
export class InMemoryLotRegistry {
  private entries = new Map<string, RegistryEntry>();

  findById(lotId: string): RegistryEntry | undefined {
    return this.entries.get(lotId);
  }

  add(lotId: string, entry: RegistryEntry): void {
    this.entries.set(lotId, entry);
  }

  remove(lotId: string): RegistryEntry | undefined {
    const entry = this.entries.get(lotId);
    this.entries.delete(lotId);
    return entry;
  }

  snapshot(): RegisteredLots {
    const out: RegisteredLots = {};
    for (const [lotId, entry] of this.entries) out[lotId] = entry.maxCapacity;
    return out;
  }

  all(): RegistryEntry[] {
    return [...this.entries.values()];
  }

  get size(): number {
    return this.entries.size;
  }
}

export class InMemorySessionRepo {
  private sessions = new Map<string, ParkingSession>();

  /** Replaces any open session for the same plate; returns the one replaced. */
  open(licensePlate: string, entryTimestamp: number): ParkingSession | undefined {
    const previous = this.sessions.get(licensePlate);
    this.sessions.set(licensePlate, { licensePlate, entryTimestamp, paid: false });
    return previous;
  }

  findByPlate(licensePlate: string): ParkingSession | undefined {
    return this.sessions.get(licensePlate);
  }

  markPaid(licensePlate: string): void {
    const s = this.sessions.get(licensePlate);
    if (s) s.paid = true;
  }

  close(licensePlate: string): boolean {
    return this.sessions.delete(licensePlate);
  }
}
