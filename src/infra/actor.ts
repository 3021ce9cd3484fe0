import { v4 as uuid } from 'uuid';
import { ActorMessage, ActorRef, ReplyTo } from "../interfaces/actor";
import { AskTimeoutError } from "./errors";
import { Logger, createLogger, describeError } from "./logger";

export const DEFAULT_ASK_TIMEOUT_MS = 5000;

/**
 * Base class for every stateful component.
 *
 * Messages land in an unbounded mailbox and are handed to `receive` one at a
 * time; the next message is taken only after the previous handler (sync or
 * async) has settled. State owned by a subclass is therefore never touched by
 * two messages at once.
 */
export abstract class Actor<M extends ActorMessage> implements ActorRef<M> {
  protected readonly log: Logger;
  private readonly mailbox: M[] = [];
  private draining = false;
  private stopped = false;

  constructor(
    readonly name: string,
    protected readonly askTimeoutMs: number = DEFAULT_ASK_TIMEOUT_MS
  ) {
    this.log = createLogger(name);
  }

  protected abstract receive(message: M): void | Promise<void>;

  /** Runs once when the actor is stopped. */
  protected postStop(): void {}

  get isStopped(): boolean {
    return this.stopped;
  }

  get mailboxSize(): number {
    return this.mailbox.length;
  }

  tell(message: M): void {
    if (this.stopped) {
      this.log.warn('Dropping message for stopped actor', { type: message.type });
      return;
    }
    this.mailbox.push(message);
    this.scheduleDrain();
  }

  ask<R>(build: (replyTo: ReplyTo<R>) => M, timeoutMs: number = this.askTimeoutMs): Promise<R> {
    return new Promise<R>((resolve, reject) => {
      const requestId = uuid();
      let settled = false;

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        reject(new AskTimeoutError(this.name, timeoutMs, requestId));
      }, timeoutMs);

      const replyTo: ReplyTo<R> = (reply) => {
        if (settled) {
          this.log.debug('Late reply discarded', { requestId });
          return;
        }
        settled = true;
        clearTimeout(timer);
        resolve(reply);
      };

      this.tell(build(replyTo));
    });
  }

  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    const dropped = this.mailbox.length;
    this.mailbox.length = 0;
    if (dropped > 0) {
      this.log.warn('Stopped with pending messages', { dropped });
    }
    this.postStop();
    this.log.debug('Actor stopped');
  }

  protected unhandled(message: unknown): void {
    this.log.warn('Received unhandled message', { message: describeMessage(message) });
  }

  private scheduleDrain(): void {
    if (this.draining) return;
    this.draining = true;
    queueMicrotask(() => {
      this.drain().catch((err: unknown) => {
        this.log.error('Mailbox loop failed', { error: describeError(err) });
      });
    });
  }

  private async drain(): Promise<void> {
    try {
      while (!this.stopped) {
        const next = this.mailbox.shift();
        if (next === undefined) break;
        try {
          await this.receive(next);
        } catch (err) {
          this.log.error('Message handler failed', { type: next.type, error: describeError(err) });
        }
      }
    } finally {
      this.draining = false;
    }
  }
}

function describeMessage(message: unknown): string {
  if (typeof message === 'object' && message !== null && 'type' in message) {
    return String(message.type);
  }
  return typeof message;
}
