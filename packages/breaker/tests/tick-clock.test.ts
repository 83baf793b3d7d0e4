import { describe, it, expect } from "vitest";
import { TickClock } from "../src/tick-clock.js";
import { BreakerError, createBreakerConfig } from "../src/types.js";

describe("TickClock", () => {
  it("starts at 0 by default and advances by one", () => {
    const clock = new TickClock();
    expect(clock.now()).toBe(0n);
    expect(clock.advance()).toBe(1n);
  });

  it("advances by a given number of ticks", () => {
    const clock = new TickClock(4n);
    expect(clock.advance(6n)).toBe(10n);
    expect(clock.now()).toBe(10n);
  });

  it("never moves backward", () => {
    const clock = new TickClock(4n);
    expect(() => clock.advance(-1n)).toThrow(BreakerError);
    expect(() => new TickClock(-1n)).toThrow(BreakerError);
    expect(clock.now()).toBe(4n);
  });
});

describe("createBreakerConfig", () => {
  it("fills defaults", () => {
    expect(createBreakerConfig()).toEqual({ cooldownDuration: 10n, windowDuration: 5n });
  });

  it("accepts a one-tick cooldown", () => {
    expect(createBreakerConfig({ cooldownDuration: 1n }).cooldownDuration).toBe(1n);
  });

  it("rejects a zero cooldown", () => {
    expect(() => createBreakerConfig({ cooldownDuration: 0n })).toThrow(
      "cooldownDuration must be > 0, got 0",
    );
  });

  it("rejects a zero window", () => {
    try {
      createBreakerConfig({ windowDuration: 0n });
      expect.unreachable("zero window should throw");
    } catch (err) {
      expect(err).toBeInstanceOf(BreakerError);
      if (err instanceof BreakerError) {
        expect(err.code).toBe("INVALID_CONFIG");
        expect(err.category).toBe("invalid-argument");
      }
    }
  });
});
