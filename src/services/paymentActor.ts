import { Actor } from "../infra/actor";
import { InMemorySessionRepo } from "../infra/inMemoryRepos";
import { PaymentCommand, PaymentStatus } from "../dtos/session.dto";
import { IFeeCalculator } from "../interfaces/feeCalculator";
import { HalfHourFeeCalculator } from "./halfHourFeeCalculator";

export interface PaymentActorOptions {
  askTimeoutMs?: number;
  calculator?: IFeeCalculator;
  now?: () => number;
}

/**
 * Open parking sessions keyed by license plate.
 *
 * A plate without a session is not an error: Pay and CheckOnLeave answer with
 * an unpaid zero-price status.
 */
export class PaymentActor extends Actor<PaymentCommand> {
  private readonly sessions = new InMemorySessionRepo();
  private readonly calculator: IFeeCalculator;
  private readonly now: () => number;

  constructor(options: PaymentActorOptions = {}) {
    super('payment', options.askTimeoutMs);
    this.calculator = options.calculator ?? new HalfHourFeeCalculator();
    this.now = options.now ?? Date.now;
  }

  protected receive(message: PaymentCommand): void {
    switch (message.type) {
      case 'CarEntered':
        this.onCarEntered(message.licensePlate, message.entryTimestamp);
        return;
      case 'Pay':
        message.replyTo(this.onPay(message.licensePlate));
        return;
      case 'CheckOnLeave':
        message.replyTo(this.quote(message.licensePlate));
        return;
      case 'DeleteOnExit':
        this.sessions.close(message.licensePlate);
        this.log.info('Session removed on exit', { licensePlate: message.licensePlate });
        message.replyTo?.({ licensePlate: message.licensePlate, status: 'deleted' });
        return;
      default:
        this.unhandled(message);
    }
  }

  private onCarEntered(licensePlate: string, entryTimestamp: number): void {
    const previous = this.sessions.open(licensePlate, entryTimestamp);
    if (previous) {
      this.log.warn('Car re-entered without exit, previous session discarded', {
        licensePlate,
        previousEntryTimestamp: previous.entryTimestamp,
        paid: previous.paid,
      });
    }
    this.log.info('Car entered', { licensePlate, entryTimestamp });
  }

  private onPay(licensePlate: string): PaymentStatus {
    const session = this.sessions.findByPlate(licensePlate);
    if (!session) return this.quote(licensePlate);

    if (session.paid) {
      this.log.warn('Session already paid, fee recomputed', { licensePlate });
    }
    this.sessions.markPaid(licensePlate);
    const status = this.quote(licensePlate);
    this.log.info('Car marked paid', { licensePlate, priceCents: status.priceCents });
    return status;
  }

  // fee at the current time, session left untouched
  private quote(licensePlate: string): PaymentStatus {
    const now = this.now();
    const session = this.sessions.findByPlate(licensePlate);
    if (!session) {
      return { licensePlate, paid: false, entryTimestamp: 0, currentTimestamp: now, priceCents: 0 };
    }
    return {
      licensePlate,
      paid: session.paid,
      entryTimestamp: session.entryTimestamp,
      currentTimestamp: now,
      priceCents: this.calculator.calculate(session.entryTimestamp, now),
    };
  }
}
