/** Reply channel carried inside request/reply messages. */
export type ReplyTo<R> = (reply: R) => void;

export interface ActorMessage {
  type: string;
}

/**
 * Handle to an actor. Holders can only enqueue messages; the actor's state
 * is never reachable through it.
 */
export interface ActorRef<M extends ActorMessage> {
  readonly name: string;

  /** Fire-and-forget: enqueue and return immediately. */
  tell(message: M): void;

  /**
   * Request/reply: `build` receives the reply channel to embed in the message.
   * Rejects with AskTimeoutError when no reply arrives within `timeoutMs`.
   */
  ask<R>(build: (replyTo: ReplyTo<R>) => M, timeoutMs?: number): Promise<R>;
}
