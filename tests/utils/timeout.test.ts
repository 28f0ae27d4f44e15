import { describe, expect, it } from "vitest";
import { raceTimeout, TIMED_OUT, withTimeout } from "../../src/utils/timeout";
import { wait } from "../helpers";

describe("raceTimeout", () => {
  it("settles with the value or the sentinel, whichever comes first", async () => {
    await expect(raceTimeout(Promise.resolve(7), 50)).resolves.toBe(7);
    await expect(raceTimeout(wait(200), 10)).resolves.toBe(TIMED_OUT);
  });
});

describe("withTimeout", () => {
  it("resolves with the promise's value when it settles first", async () => {
    await expect(withTimeout(Promise.resolve("done"), 50, "fast")).resolves.toBe("done");
  });

  it("rejects with the label once the limit passes", async () => {
    await expect(withTimeout(wait(200), 10, "slow call")).rejects.toThrow("slow call timed out after 10ms");
  });
});
