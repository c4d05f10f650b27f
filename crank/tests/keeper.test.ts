import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Keypair } from "@solana/web3.js";
import { DEFAULT_KEY_HASH, RaffleState } from "../../src/lib/constants.js";
import { silentLogger, type Logger } from "../../src/lib/log.js";
import type { RandomnessOracle } from "../../src/lib/oracle.js";
import { Raffle } from "../../src/lib/raffle.js";
import { createKeeper, type KeeperOptions } from "../src/keeper.js";
import { LocalVrfCoordinator } from "../src/localVrf.js";

const START = 1_700_000_000;

function recordingLogger() {
  const lines: string[] = [];
  const logger: Logger = {
    info: (msg) => lines.push(msg),
    warn: (msg) => lines.push(msg),
    error: (msg) => lines.push(msg),
  };
  return { lines, logger };
}

describe("createKeeper", () => {
  let now: number;
  let oracle: RandomnessOracle & { calls: number; fail: boolean };
  let raffle: Raffle;
  let options: KeeperOptions;

  beforeEach(() => {
    now = START;
    oracle = {
      calls: 0,
      fail: false,
      async requestRandomWords() {
        this.calls++;
        if (this.fail) throw new Error("coordinator offline");
        return BigInt(this.calls);
      },
    };
    raffle = new Raffle(
      {
        entranceFee: 10n,
        intervalSec: 30,
        keyHash: DEFAULT_KEY_HASH,
        subscriptionId: 1n,
        callbackGasLimit: 500_000,
        requestConfirmations: 3,
        numWords: 1,
        nativePayment: false,
      },
      {
        oracle,
        payout: { transfer: async () => ({ ok: true, signature: "sig" }) },
        clock: () => now,
        logger: silentLogger,
      }
    );
    options = {
      pollIntervalMs: 1_000,
      retryMinSec: 5,
      retryMaxSec: 60,
      stuckCalculatingSec: 180,
      stuckWarnRepeatSec: 60,
      healthLogIntervalSec: 0,
      clock: () => now,
      logger: silentLogger,
    };
  });

  it("stays idle until upkeep is needed", async () => {
    const keeper = createKeeper(raffle, options);
    raffle.enter(Keypair.generate().publicKey, 10n);

    expect(await keeper.tick()).toEqual({ kind: "idle" });
    now += 30;
    expect(await keeper.tick()).toEqual({ kind: "triggered", requestId: 1n });
    expect(raffle.getRaffleState()).toBe(RaffleState.Calculating);
    expect(keeper.stats()).toMatchObject({ ticks: 2, triggers: 1 });
  });

  it("never triggers twice for the same pending round", async () => {
    const keeper = createKeeper(raffle, options);
    raffle.enter(Keypair.generate().publicKey, 10n);
    now += 30;

    await keeper.tick();
    now += 30;
    expect(await keeper.tick()).toEqual({ kind: "awaiting_oracle", requestId: 1n });
    expect(oracle.calls).toBe(1);
  });

  it("backs off after an oracle failure and retries later", async () => {
    const keeper = createKeeper(raffle, options);
    raffle.enter(Keypair.generate().publicKey, 10n);
    now += 30;
    oracle.fail = true;

    expect(await keeper.tick()).toEqual({
      kind: "failed",
      reason: "Randomness request failed: coordinator offline",
    });
    expect(raffle.getRaffleState()).toBe(RaffleState.Open);

    now += 4;
    expect(await keeper.tick()).toEqual({ kind: "backoff", nextAttemptAtSec: START + 35 });

    now += 1;
    expect(await keeper.tick()).toMatchObject({ kind: "failed" });

    now += 9;
    expect(await keeper.tick()).toEqual({ kind: "backoff", nextAttemptAtSec: START + 45 });

    oracle.fail = false;
    now += 1;
    expect(await keeper.tick()).toEqual({ kind: "triggered", requestId: 3n });
    expect(keeper.stats()).toMatchObject({ failures: 2, triggers: 1 });
  });

  it("warns about a stalled request without cancelling it", async () => {
    const { lines, logger } = recordingLogger();
    const keeper = createKeeper(raffle, { ...options, logger });
    raffle.enter(Keypair.generate().publicKey, 10n);
    now += 30;
    await keeper.tick();

    now += 179;
    await keeper.tick();
    expect(keeper.stats().stuckWarnings).toBe(0);

    now += 1;
    await keeper.tick();
    expect(lines).toContain(
      "⚠ Randomness request #1 unanswered for 3m (threshold=180s); round stays locked"
    );

    now += 30;
    await keeper.tick();
    expect(keeper.stats().stuckWarnings).toBe(1);

    now += 30;
    await keeper.tick();
    expect(keeper.stats().stuckWarnings).toBe(2);
    expect(raffle.getRaffleState()).toBe(RaffleState.Calculating);
  });

  it("restarts the stall timer when a new request replaces the observed one", async () => {
    const { lines, logger } = recordingLogger();
    const keeper = createKeeper(raffle, { ...options, logger });
    raffle.enter(Keypair.generate().publicKey, 10n);
    now += 30;
    expect(await keeper.tick()).toEqual({ kind: "triggered", requestId: 1n });

    now = START + 210;
    await keeper.tick();
    expect(keeper.stats().stuckWarnings).toBe(1);

    await raffle.fulfillRandomWords(1n, [0n]);
    raffle.enter(Keypair.generate().publicKey, 10n);
    now = START + 240;
    expect(await raffle.performUpkeep()).toBe(2n);

    now += 10;
    expect(await keeper.tick()).toEqual({ kind: "awaiting_oracle", requestId: 2n });
    now += 30;
    await keeper.tick();
    expect(keeper.stats().stuckWarnings).toBe(1);

    now = START + 420;
    await keeper.tick();
    expect(keeper.stats().stuckWarnings).toBe(2);
    expect(lines.at(-1)).toBe(
      "⚠ Randomness request #2 unanswered for 3m (threshold=180s); round stays locked"
    );
  });

  it("logs a health line on its interval", async () => {
    const { lines, logger } = recordingLogger();
    const keeper = createKeeper(raffle, { ...options, healthLogIntervalSec: 60, logger });
    raffle.enter(Keypair.generate().publicKey, 10_000_000n);
    now += 12;

    await keeper.tick();
    await keeper.tick();

    expect(lines).toEqual([
      "♥ state=Open players=1 pot=0.0100 SOL round_age=12s triggers=0 failures=0",
    ]);
  });

  describe("with the local coordinator", () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it("runs a full round from the poll loop", async () => {
      const vrf = new LocalVrfCoordinator({
        seed: new Uint8Array(32),
        confirmationMs: 100,
        logger: silentLogger,
      });
      const transfers: bigint[] = [];
      const r = new Raffle(
        {
          entranceFee: 10n,
          intervalSec: 30,
          keyHash: DEFAULT_KEY_HASH,
          subscriptionId: 1n,
          callbackGasLimit: 500_000,
          requestConfirmations: 1,
          numWords: 1,
          nativePayment: false,
        },
        {
          oracle: vrf,
          payout: {
            transfer: async (_to, amount) => {
              transfers.push(amount);
              return { ok: true, signature: "sig" };
            },
          },
          clock: () => now,
          logger: silentLogger,
        }
      );
      vrf.setConsumer(async (id, words) => {
        await r.fulfillRandomWords(id, words);
      });
      const entrants = [Keypair.generate().publicKey, Keypair.generate().publicKey];
      for (const p of entrants) r.enter(p, 10n);
      now += 30;

      const keeper = createKeeper(r, options);
      keeper.start();
      await vi.advanceTimersByTimeAsync(1_000);
      expect(r.getRaffleState()).toBe(RaffleState.Calculating);

      await vi.advanceTimersByTimeAsync(100);
      keeper.stop();

      expect(r.getRaffleState()).toBe(RaffleState.Open);
      expect(transfers).toEqual([20n]);
      const winner = r.getRecentWinner();
      expect(entrants.some((p) => winner !== null && p.equals(winner))).toBe(true);
      expect(vi.getTimerCount()).toBe(0);
    });
  });
});
