/**
 * In-process randomness coordinator.
 *
 * Assigns request ids from 1, holds each request for
 * `requestConfirmations * confirmationMs`, then derives the words and calls
 * the consumer. Words are sha256(seed ‖ requestId ‖ index) read big-endian,
 * so a fixed seed replays the same draw.
 */
import { createHash, randomBytes } from "crypto";
import type { FulfillCallback, RandomnessOracle, RandomnessRequest } from "../../src/lib/oracle.js";
import { createLogger, type Logger } from "../../src/lib/log.js";

export interface PendingVrfRequest {
  requestId: bigint;
  request: RandomnessRequest;
  timer?: NodeJS.Timeout;
}

export interface LocalVrfOptions {
  seed?: Uint8Array;
  confirmationMs?: number;
  /** When false, requests wait for a manual `fulfill`. */
  autoFulfill?: boolean;
  logger?: Logger;
}

function u64BE(value: bigint): Buffer {
  const out = Buffer.alloc(8);
  out.writeBigUInt64BE(value);
  return out;
}

export function deriveRandomWords(seed: Uint8Array, requestId: bigint, numWords: number): bigint[] {
  const words: bigint[] = [];
  for (let i = 0; i < numWords; i++) {
    const digest = createHash("sha256")
      .update(seed)
      .update(u64BE(requestId))
      .update(u64BE(BigInt(i)))
      .digest("hex");
    words.push(BigInt(`0x${digest}`));
  }
  return words;
}

export class LocalVrfCoordinator implements RandomnessOracle {
  private readonly seed: Uint8Array;
  private readonly confirmationMs: number;
  private readonly autoFulfill: boolean;
  private readonly logger: Logger;
  private readonly pending = new Map<bigint, PendingVrfRequest>();
  private consumer: FulfillCallback | null = null;
  private nextRequestId = 1n;
  private randomNumbers = 0;

  constructor(options: LocalVrfOptions = {}) {
    this.seed = options.seed ?? randomBytes(32);
    this.confirmationMs = options.confirmationMs ?? 400;
    this.autoFulfill = options.autoFulfill ?? true;
    this.logger = options.logger ?? createLogger("vrf");
  }

  setConsumer(callback: FulfillCallback): void {
    this.consumer = callback;
  }

  get requestsCounter(): number {
    return Number(this.nextRequestId - 1n);
  }

  get randomNumbersCounter(): number {
    return this.randomNumbers;
  }

  pendingRequests(): bigint[] {
    return [...this.pending.keys()];
  }

  async requestRandomWords(request: RandomnessRequest): Promise<bigint> {
    if (request.numWords < 1) {
      throw new Error(`numWords must be positive, got ${request.numWords}`);
    }
    const requestId = this.nextRequestId++;
    const entry: PendingVrfRequest = { requestId, request };
    this.pending.set(requestId, entry);

    if (this.autoFulfill) {
      const delay = request.requestConfirmations * this.confirmationMs;
      entry.timer = setTimeout(() => {
        this.fulfill(requestId).catch((e: unknown) => {
          this.logger.error(`✗ Fulfilment of #${requestId} failed`, e);
        });
      }, delay);
    }
    return requestId;
  }

  /** Delivers words for a pending request. `words` overrides the derived ones. */
  async fulfill(requestId: bigint, words?: readonly bigint[]): Promise<void> {
    const entry = this.pending.get(requestId);
    if (!entry) {
      throw new Error(`Unknown VRF request #${requestId}`);
    }
    if (!this.consumer) {
      throw new Error("No VRF consumer registered");
    }
    if (entry.timer) clearTimeout(entry.timer);
    this.pending.delete(requestId);

    const randomWords = words ?? deriveRandomWords(this.seed, requestId, entry.request.numWords);
    this.randomNumbers += randomWords.length;
    await this.consumer(requestId, randomWords);
  }

  close(): void {
    for (const entry of this.pending.values()) {
      if (entry.timer) clearTimeout(entry.timer);
    }
    this.pending.clear();
  }
}
