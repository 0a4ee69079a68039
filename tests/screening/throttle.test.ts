import { describe, it, expect } from "vitest";
import { createPacingGate, IntervalGate, NoopGate } from "../../src/screening/throttle.js";

/** Clock that only moves when told to or when the gate sleeps */
function fakeClock() {
  let t = 1_000;
  const sleeps: number[] = [];
  return {
    sleeps,
    advance: (ms: number) => {
      t += ms;
    },
    now: () => t,
    sleep: async (ms: number) => {
      sleeps.push(ms);
      t += ms;
    },
  };
}

describe("IntervalGate", () => {
  it("should let the first call through immediately", async () => {
    const clock = fakeClock();
    const gate = new IntervalGate({ intervalMs: 800, now: clock.now, sleep: clock.sleep });
    await gate.wait();
    expect(clock.sleeps).toEqual([]);
  });

  it("should wait out the rest of the interval between back-to-back calls", async () => {
    const clock = fakeClock();
    const gate = new IntervalGate({ intervalMs: 800, now: clock.now, sleep: clock.sleep });
    await gate.wait();
    clock.advance(300);
    await gate.wait();
    await gate.wait();
    expect(clock.sleeps).toEqual([500, 800]);
  });

  it("should not wait when the interval has already passed", async () => {
    const clock = fakeClock();
    const gate = new IntervalGate({ intervalMs: 800, now: clock.now, sleep: clock.sleep });
    await gate.wait();
    clock.advance(1_200);
    await gate.wait();
    expect(clock.sleeps).toEqual([]);
  });

  it("should reject a negative interval", () => {
    expect(() => new IntervalGate({ intervalMs: -1 })).toThrow(RangeError);
  });
});

describe("createPacingGate", () => {
  it("should disable pacing for a zero interval", () => {
    expect(createPacingGate(0)).toBeInstanceOf(NoopGate);
    expect(createPacingGate(800)).toBeInstanceOf(IntervalGate);
  });
});
