/**
 * Minimal typed pub/sub for raffle notifications.
 * A throwing listener is reported through `onListenerError` and never aborts the emitter.
 */
import type { PublicKey } from "@solana/web3.js";

export type RaffleEvents = {
  entered: { player: PublicKey; amount: bigint };
  requestedWinner: { requestId: bigint };
  winnerPicked: { winner: PublicKey; requestId: bigint };
  payoutSent: { winner: PublicKey; amount: bigint; signature: string };
  payoutFailed: { winner: PublicKey; amount: bigint; reason: string };
};

export type RaffleEventName = keyof RaffleEvents;

type Listener<E extends RaffleEventName> = (payload: RaffleEvents[E]) => void;

type ListenerMap = { [E in RaffleEventName]: Set<Listener<E>> };

export class RaffleEventBus {
  private readonly listeners: ListenerMap = {
    entered: new Set(),
    requestedWinner: new Set(),
    winnerPicked: new Set(),
    payoutSent: new Set(),
    payoutFailed: new Set(),
  };

  constructor(private readonly onListenerError: (event: RaffleEventName, err: unknown) => void) {}

  on<E extends RaffleEventName>(event: E, fn: Listener<E>): () => void {
    const set: Set<Listener<E>> = this.listeners[event];
    set.add(fn);
    return () => {
      set.delete(fn);
    };
  }

  emit<E extends RaffleEventName>(event: E, payload: RaffleEvents[E]): void {
    const set: Set<Listener<E>> = this.listeners[event];
    for (const fn of set) {
      try {
        fn(payload);
      } catch (e) {
        this.onListenerError(event, e);
      }
    }
  }
}
