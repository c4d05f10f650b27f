import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createHash } from "crypto";
import { silentLogger } from "../../src/lib/log.js";
import type { RandomnessRequest } from "../../src/lib/oracle.js";
import { LocalVrfCoordinator, deriveRandomWords } from "../src/localVrf.js";

const request: RandomnessRequest = {
  keyHash: "0x" + "ab".repeat(32),
  subId: 1n,
  requestConfirmations: 3,
  callbackGasLimit: 500_000,
  numWords: 1,
  nativePayment: false,
};

const seed = new Uint8Array(32).fill(7);

describe("deriveRandomWords", () => {
  it("hashes seed, request id and word index", () => {
    const idx = Buffer.alloc(8);
    const id = Buffer.alloc(8);
    id.writeBigUInt64BE(5n);
    const expected = BigInt("0x" + createHash("sha256").update(seed).update(id).update(idx).digest("hex"));

    expect(deriveRandomWords(seed, 5n, 1)).toEqual([expected]);
  });

  it("is deterministic per seed and differs per request", () => {
    expect(deriveRandomWords(seed, 1n, 2)).toEqual(deriveRandomWords(seed, 1n, 2));
    expect(deriveRandomWords(seed, 1n, 1)[0]).not.toBe(deriveRandomWords(seed, 2n, 1)[0]);
  });
});

describe("LocalVrfCoordinator", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("assigns increasing request ids and counts them", async () => {
    const vrf = new LocalVrfCoordinator({ seed, autoFulfill: false, logger: silentLogger });
    expect(vrf.requestsCounter).toBe(0);
    expect(await vrf.requestRandomWords(request)).toBe(1n);
    expect(await vrf.requestRandomWords(request)).toBe(2n);
    expect(vrf.requestsCounter).toBe(2);
    expect(vrf.pendingRequests()).toEqual([1n, 2n]);
  });

  it("fulfils after the confirmation delay", async () => {
    const vrf = new LocalVrfCoordinator({ seed, confirmationMs: 100, logger: silentLogger });
    const consumer = vi.fn(async () => {});
    vrf.setConsumer(consumer);

    const id = await vrf.requestRandomWords(request);
    await vi.advanceTimersByTimeAsync(299);
    expect(consumer).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(consumer).toHaveBeenCalledWith(id, deriveRandomWords(seed, id, 1));
    expect(vrf.randomNumbersCounter).toBe(1);
    expect(vrf.pendingRequests()).toEqual([]);
  });

  it("manual fulfil accepts explicit words and cancels the timer", async () => {
    const vrf = new LocalVrfCoordinator({ seed, confirmationMs: 100, logger: silentLogger });
    const consumer = vi.fn(async () => {});
    vrf.setConsumer(consumer);

    const id = await vrf.requestRandomWords(request);
    await vrf.fulfill(id, [7n]);
    await vi.advanceTimersByTimeAsync(1_000);

    expect(consumer).toHaveBeenCalledTimes(1);
    expect(consumer).toHaveBeenCalledWith(id, [7n]);
  });

  it("rejects unknown requests and a missing consumer", async () => {
    const vrf = new LocalVrfCoordinator({ seed, autoFulfill: false, logger: silentLogger });
    await expect(vrf.fulfill(9n)).rejects.toThrow("Unknown VRF request #9");

    const id = await vrf.requestRandomWords(request);
    await expect(vrf.fulfill(id)).rejects.toThrow("No VRF consumer registered");
  });

  it("logs a consumer failure during automatic fulfilment", async () => {
    const errors: string[] = [];
    const vrf = new LocalVrfCoordinator({
      seed,
      confirmationMs: 10,
      logger: { ...silentLogger, error: (msg) => errors.push(msg) },
    });
    vrf.setConsumer(async () => {
      throw new Error("payout failed");
    });

    await vrf.requestRandomWords(request);
    await vi.advanceTimersByTimeAsync(30);

    expect(errors).toEqual(["✗ Fulfilment of #1 failed"]);
  });

  it("close drops pending requests", async () => {
    const vrf = new LocalVrfCoordinator({ seed, confirmationMs: 10, logger: silentLogger });
    const consumer = vi.fn(async () => {});
    vrf.setConsumer(consumer);
    await vrf.requestRandomWords(request);

    vrf.close();
    await vi.advanceTimersByTimeAsync(100);

    expect(consumer).not.toHaveBeenCalled();
    expect(vrf.pendingRequests()).toEqual([]);
  });
});
