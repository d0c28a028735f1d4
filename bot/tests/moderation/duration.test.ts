import { describe, it, expect } from "vitest";
import { ValidationError } from "../../src/core/errors.js";
import { MAX_DURATION_MS } from "../../plugins/moderation/utils/constants.js";
import { durationError, formatDuration, parseDuration } from "../../plugins/moderation/utils/duration.js";
import { PUNISHMENT_TIERS, actionLabel, punishmentForTier, tierForCount } from "../../plugins/moderation/utils/punishment-tiers.js";

describe("parseDuration", () => {
  it.each([
    ["30s", 30_000],
    ["5m", 300_000],
    ["2h", 7_200_000],
    ["1d", 86_400_000],
    ["1w", 604_800_000],
    ["1d12h", 129_600_000],
    [" 1H 30M ", 5_400_000],
  ])("parses %j", (input, expected) => {
    expect(parseDuration(input)).toBe(expected);
  });

  it.each(["", "10", "abc", "5y", "-5m", "1.5h", "m5"])("rejects %j", (input) => {
    expect(() => parseDuration(input)).toThrow(ValidationError);
  });

  it("rejects a zero duration", () => {
    expect(() => parseDuration("0m")).toThrow('Invalid duration "0m". The duration must be greater than zero.');
  });

  it("accepts up to a year and rejects anything longer", () => {
    expect(parseDuration("365d")).toBe(MAX_DURATION_MS);
    expect(() => parseDuration("365d1s")).toThrow('Invalid duration "365d1s". The duration must be at most 365d.');
    expect(() => parseDuration("14300000w")).toThrow('Invalid duration "14300000w". The duration must be at most 365d.');
  });
});

describe("durationError", () => {
  it("accepts a duration that ends on a representable date", () => {
    expect(durationError(60_000, Date.UTC(2026, 2, 1))).toBeUndefined();
  });

  it("names the subject in the message", () => {
    expect(durationError(0, 0, "The ban duration")).toBe("The ban duration must be greater than zero.");
    expect(durationError(MAX_DURATION_MS + 1)).toBe("The duration must be at most 365d.");
  });

  it("rejects an expiry past the last valid date", () => {
    expect(durationError(60_000, 8.64e15)).toBe("The duration ends past the latest supported date.");
  });
});

describe("formatDuration", () => {
  it("lists the non-zero parts", () => {
    expect(formatDuration(93_784_000)).toBe("1d 2h 3m 4s");
    expect(formatDuration(1_800_000)).toBe("30m");
  });

  it("shows zero as 0s", () => {
    expect(formatDuration(0)).toBe("0s");
  });
});

describe("punishment tiers", () => {
  it("maps each tier to its punishment", () => {
    expect(PUNISHMENT_TIERS.map((spec) => spec.action)).toEqual(["warn", "timeout", "timeout", "timeout", "ban"]);
    expect(punishmentForTier(2)).toEqual({ action: "timeout", durationMs: 1_800_000 });
    expect(punishmentForTier(3)).toEqual({ action: "timeout", durationMs: 7_200_000 });
    expect(punishmentForTier(4)).toEqual({ action: "timeout", durationMs: 86_400_000 });
    expect(punishmentForTier(5)).toEqual({ action: "ban" });
  });

  it("clamps tiers outside the table", () => {
    expect(punishmentForTier(0)).toEqual({ action: "warn" });
    expect(punishmentForTier(9)).toEqual({ action: "ban" });
  });

  it("caps the tier at five", () => {
    expect([0, 1, 4, 5, 6, 40].map(tierForCount)).toEqual([0, 1, 4, 5, 5, 5]);
  });

  it("labels actions", () => {
    expect(actionLabel("timeout")).toBe("Timeout");
  });
});
