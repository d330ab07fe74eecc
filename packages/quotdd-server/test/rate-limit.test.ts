import { describe, expect, it } from "vitest";
import { DecayingRateLimiter } from "../src/rate-limit.js";

describe("DecayingRateLimiter", () => {
  it("admits the first ten attempts and rejects the rest", () => {
    const limiter = new DecayingRateLimiter();

    for (let i = 0; i < 10; i += 1) {
      expect(limiter.accept("127.0.0.1")).toBe(true);
    }
    expect(limiter.accept("127.0.0.1")).toBe(false);
    expect(limiter.accept("127.0.0.1")).toBe(false);
    expect(limiter.count("127.0.0.1")).toBe(12);
  });

  it("treats unseen addresses as zero", () => {
    const limiter = new DecayingRateLimiter();

    expect(limiter.count("10.0.0.1")).toBe(0);
    expect(limiter.accept("10.0.0.1")).toBe(true);
  });

  it("keeps counting rejected attempts across a decay", () => {
    const limiter = new DecayingRateLimiter();
    const ip = "127.0.0.1";

    for (let i = 0; i < 10; i += 1) {
      expect(limiter.accept(ip)).toBe(true);
    }
    for (let i = 0; i < 10; i += 1) {
      expect(limiter.accept(ip)).toBe(false);
    }

    limiter.decay();
    expect(limiter.accept(ip)).toBe(false);

    // 21 attempts minus two decays of 10 leaves the one rejected after the first decay.
    limiter.decay();
    expect(limiter.count(ip)).toBe(1);
    expect(limiter.accept(ip)).toBe(true);
  });

  it("prunes addresses that decay to zero", () => {
    const limiter = new DecayingRateLimiter();
    limiter.accept("10.0.0.1");
    limiter.accept("10.0.0.1");
    for (let i = 0; i < 10; i += 1) {
      limiter.accept("10.0.0.2");
    }

    limiter.decay();

    expect(limiter.count("10.0.0.1")).toBe(0);
    expect(limiter.count("10.0.0.2")).toBe(0);
    expect(limiter.trackedAddresses).toBe(0);
  });

  it("carries the remainder above the decay amount forward", () => {
    const limiter = new DecayingRateLimiter();
    for (let i = 0; i < 13; i += 1) {
      limiter.accept("10.0.0.3");
    }

    limiter.decay();

    expect(limiter.count("10.0.0.3")).toBe(3);
    expect(limiter.trackedAddresses).toBe(1);
  });

  it("tracks addresses independently", () => {
    const limiter = new DecayingRateLimiter({ threshold: 1, decayAmount: 1 });

    expect(limiter.accept("10.0.0.1")).toBe(true);
    expect(limiter.accept("10.0.0.1")).toBe(false);
    expect(limiter.accept("10.0.0.2")).toBe(true);
  });

  it("rejects a non-positive policy", () => {
    expect(() => new DecayingRateLimiter({ threshold: 0, decayAmount: 10 })).toThrow(
      "Invalid rate limit threshold: 0",
    );
    expect(() => new DecayingRateLimiter({ threshold: 10, decayAmount: 1.5 })).toThrow(
      "Invalid rate limit decay amount: 1.5",
    );
  });
});
