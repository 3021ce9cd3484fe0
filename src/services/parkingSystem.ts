import { AppConfig, DEFAULT_CONFIG } from "../infra/config";
import { configureLogging, createLogger, isPrettyEnv } from "../infra/logger";
import { LoggingEventPublisher } from "../infra/loggingPublisher";
import { IEventPublisher } from "../interfaces/publisher";
import { IFeeCalculator } from "../interfaces/feeCalculator";
import { LotDeregistered, LotRegistered, LotStatus, RegisteredLots } from "../dtos/lot.dto";
import { PaymentStatus, SessionDeleted } from "../dtos/session.dto";
import { BookingConfirmation } from "../dtos/booking.dto";
import { NearbyLot } from "../dtos/routing.dto";
import {
  BookingRequestInput,
  BookingRequestSchema,
  CarEnteredInput,
  CarEnteredSchema,
  LicensePlateSchema,
  LotIdSchema,
  NearbyQueryInput,
  NearbyQuerySchema,
  OccupancyReportInput,
  OccupancyReportSchema,
  RegisterLotInput,
  RegisterLotSchema,
  parseInput,
} from "../dtos/schemas";
import { LotSupervisor } from "./lotSupervisor";
import { PaymentActor } from "./paymentActor";
import { BookingActor } from "./bookingActor";
import { RoutingActor } from "./routingActor";
import { HalfHourFeeCalculator } from "./halfHourFeeCalculator";

const log = createLogger('system');

export interface ParkingSystemDeps {
  config?: Partial<AppConfig>;
  publisher?: IEventPublisher;
  calculator?: IFeeCalculator;
  now?: () => number;
}

/**
 * Entry point for a gateway. Validates boundary input, then turns each call
 * into a tell or an ask on the owning actor.
 *
 * Ask-based calls return promises that reject with ValidationError on bad
 * input and AskTimeoutError when the actor does not answer in time. Tell-based
 * calls throw ValidationError synchronously.
 */
export class ParkingSystem {
  readonly config: AppConfig;
  readonly publisher: IEventPublisher;
  private readonly now: () => number;
  private readonly supervisor: LotSupervisor;
  private readonly payment: PaymentActor;
  private readonly booking: BookingActor;
  private readonly routing: RoutingActor;

  constructor(deps: ParkingSystemDeps = {}) {
    this.config = { ...DEFAULT_CONFIG, ...deps.config };
    // logging is process-wide; only touch it when the caller asked to
    configureLogging({
      level: deps.config?.logLevel,
      pretty: deps.config?.nodeEnv === undefined ? undefined : isPrettyEnv(deps.config.nodeEnv),
    });
    this.publisher = deps.publisher ?? new LoggingEventPublisher();
    this.now = deps.now ?? Date.now;

    const timeout = this.config.askTimeoutMs;
    this.supervisor = new LotSupervisor(timeout, this.now);
    this.payment = new PaymentActor({
      askTimeoutMs: timeout,
      calculator: deps.calculator ?? new HalfHourFeeCalculator(this.config.pricePerHourCents),
      now: this.now,
    });
    this.booking = new BookingActor(this.publisher, timeout);
    this.routing = new RoutingActor(this.supervisor, timeout);

    log.info('Parking system started', { askTimeoutMs: timeout, pricePerHourCents: this.config.pricePerHourCents });
  }

  // ---- lots ----

  async registerLot(input: RegisterLotInput): Promise<LotRegistered> {
    const lot = parseInput(RegisterLotSchema, input, 'registration');
    return this.supervisor.ask<LotRegistered>((replyTo) => ({ type: 'Register', ...lot, replyTo }));
  }

  /** Startup path: no confirmation is awaited. */
  registerLotAsync(input: RegisterLotInput): void {
    const lot = parseInput(RegisterLotSchema, input, 'registration');
    this.supervisor.tell({ type: 'Register', ...lot });
  }

  async deregisterLot(lotId: string): Promise<LotDeregistered> {
    const id = parseInput(LotIdSchema, lotId, 'lotId');
    return this.supervisor.ask<LotDeregistered>((replyTo) => ({ type: 'Deregister', lotId: id, replyTo }));
  }

  reportOccupancy(input: OccupancyReportInput): void {
    const report = parseInput(OccupancyReportSchema, input, 'occupancy report');
    this.supervisor.tell({
      type: 'UpdateOccupancy',
      lotId: report.lotId,
      currentOccupancy: report.currentOccupancy,
      timestamp: report.timestamp ?? this.now(),
      edgeServerId: report.edgeServerId,
    });
  }

  async getLotStatus(lotId: string): Promise<LotStatus> {
    const id = parseInput(LotIdSchema, lotId, 'lotId');
    return this.supervisor.ask<LotStatus>((replyTo) => ({ type: 'GetStatus', lotId: id, replyTo }));
  }

  async listLots(): Promise<RegisteredLots> {
    return this.supervisor.ask<RegisteredLots>((replyTo) => ({ type: 'GetRegistered', replyTo }));
  }

  async findNearby(input: NearbyQueryInput): Promise<NearbyLot[]> {
    const query = parseInput(NearbyQuerySchema, input, 'nearby query');
    return this.routing.ask<NearbyLot[]>((replyTo) => ({ type: 'GetNearbyLots', ...query, replyTo }));
  }

  // ---- payments ----

  carEntered(input: CarEnteredInput): void {
    const entry = parseInput(CarEnteredSchema, input, 'car entry');
    this.payment.tell({
      type: 'CarEntered',
      licensePlate: entry.licensePlate,
      entryTimestamp: entry.entryTimestamp ?? this.now(),
    });
  }

  async pay(licensePlate: string): Promise<PaymentStatus> {
    const plate = parseInput(LicensePlateSchema, licensePlate, 'licensePlate');
    return this.payment.ask<PaymentStatus>((replyTo) => ({ type: 'Pay', licensePlate: plate, replyTo }));
  }

  async checkOnLeave(licensePlate: string): Promise<PaymentStatus> {
    const plate = parseInput(LicensePlateSchema, licensePlate, 'licensePlate');
    return this.payment.ask<PaymentStatus>((replyTo) => ({ type: 'CheckOnLeave', licensePlate: plate, replyTo }));
  }

  async deleteOnExit(licensePlate: string): Promise<SessionDeleted> {
    const plate = parseInput(LicensePlateSchema, licensePlate, 'licensePlate');
    return this.payment.ask<SessionDeleted>((replyTo) => ({ type: 'DeleteOnExit', licensePlate: plate, replyTo }));
  }

  // ---- bookings ----

  async book(input: BookingRequestInput): Promise<BookingConfirmation> {
    const req = parseInput(BookingRequestSchema, input, 'booking');
    return this.booking.ask<BookingConfirmation>((replyTo) => ({ type: 'Book', ...req, replyTo }));
  }

  async cancel(input: BookingRequestInput): Promise<BookingConfirmation> {
    const req = parseInput(BookingRequestSchema, input, 'booking');
    return this.booking.ask<BookingConfirmation>((replyTo) => ({ type: 'Cancel', ...req, replyTo }));
  }

  shutdown(): void {
    log.info('Shutting down parking system');
    this.routing.stop();
    this.booking.stop();
    this.payment.stop();
    this.supervisor.stop();
  }
}
