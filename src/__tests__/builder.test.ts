import { describe, expect, it } from "vitest";
import {
  ConfigurationBuilder,
  checkAxisMapping,
  homeSwitchFromNumber,
} from "../config/builder.js";
import { UsageError } from "../errors.js";
import { DEFAULT_PROFILE, type HardwareProfile } from "../types.js";

describe("ConfigurationBuilder", () => {
  it("starts from the hardware defaults", () => {
    const config = new ConfigurationBuilder().build();

    expect(config).toEqual({
      stepsPerMM: [160, 160, 160, 40, 1, 0, 0],
      maxFeedrate: [200, 200, 90, 10, 1, 0, 0],
      acceleration: [4000, 4000, 1000, 10000, 1, 0, 0],
      moveRangeMM: [100, 100, 100, -1, -1, -1, -1],
      homeSwitch: ["origin", "origin", "origin", "none", "none", "none", "none"],
      channelLayout: "23140",
      axisMapping: "XYZEA",
      speedFactor: 1,
      dryRun: false,
      debugPrint: false,
      synchronous: false,
    });
  });

  it("seeds from an injected profile", () => {
    const bench: HardwareProfile = {
      ...DEFAULT_PROFILE,
      stepsPerMM: [10, 20, 30, 40, 50, 60, 70],
      axisMapping: "ZYX",
    };
    const config = new ConfigurationBuilder(bench).setStepsPerMM("1").build();

    expect(config.stepsPerMM).toEqual([1, 20, 30, 40, 50, 60, 70]);
    expect(config.axisMapping).toBe("ZYX");
    expect(DEFAULT_PROFILE.stepsPerMM).toEqual([160, 160, 160, 40, 1, 0, 0]);
  });

  it("applies repeated overrides in order on top of each other", () => {
    const config = new ConfigurationBuilder()
      .setMaxFeedrate("1,2,3")
      .setMaxFeedrate("9")
      .build();

    expect(config.maxFeedrate).toEqual([9, 2, 3, 10, 1, 0, 0]);
  });

  it("forwards non-positive acceleration untouched", () => {
    const config = new ConfigurationBuilder().setAcceleration("0,-1").build();
    expect(config.acceleration).toEqual([0, -1, 1000, 10000, 1, 0, 0]);
  });

  it("sets move ranges", () => {
    const config = new ConfigurationBuilder().setMoveRange("200,-1,50").build();
    expect(config.moveRangeMM).toEqual([200, -1, 50, -1, -1, -1, -1]);
  });

  it("narrows home switch numbers and keeps trailing entries", () => {
    const config = new ConfigurationBuilder().setHomeSwitch("2,0.9").build();
    expect(config.homeSwitch).toEqual([
      "end-of-range", "none", "origin", "none", "none", "none", "none",
    ]);
  });

  it("rejects home switch values outside 0..2", () => {
    expect(() => new ConfigurationBuilder().setHomeSwitch("1,3")).toThrow(
      "Failed to parse home switch: 3 is not 0, 1 or 2."
    );
  });

  it("names the option that failed to parse", () => {
    const builder = new ConfigurationBuilder();
    expect(() => builder.setStepsPerMM("x")).toThrow("steps/mm failed to parse.");
    expect(() => builder.setMaxFeedrate("")).toThrow("max-feedrate missing.");
    expect(() => builder.setAcceleration(",")).toThrow("Acceleration missing.");
    expect(() => builder.setMoveRange("r")).toThrow("Failed to parse ranges.");
    expect(() => builder.setHomeSwitch("h")).toThrow("Failed to parse home switch.");
    expect(() => builder.setStepsPerMM("x")).toThrow(UsageError);
  });

  it("accepts only a positive speed factor", () => {
    const builder = new ConfigurationBuilder();
    expect(() => builder.setSpeedFactor(0)).toThrow("Speedfactor cannot be <= 0");
    expect(() => builder.setSpeedFactor(-1)).toThrow(UsageError);
    expect(() => builder.setSpeedFactor(NaN)).toThrow(UsageError);
    expect(builder.setSpeedFactor(2.5).build().speedFactor).toBe(2.5);
  });

  it("toggles the execution flags", () => {
    const config = new ConfigurationBuilder()
      .setDryRun()
      .setDebugPrint()
      .setSynchronous(false)
      .build();

    expect(config.dryRun).toBe(true);
    expect(config.debugPrint).toBe(true);
    expect(config.synchronous).toBe(false);
  });

  it("builds a frozen configuration the builder no longer touches", () => {
    const builder = new ConfigurationBuilder();
    const config = builder.build();
    builder.setStepsPerMM("1");

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.stepsPerMM)).toBe(true);
    expect(config.stepsPerMM[0]).toBe(160);
  });
});

describe("axis mapping", () => {
  it("accepts axis letters in either case and '_' up to seven channels", () => {
    expect(checkAxisMapping("XY_ZE")).toBeNull();
    expect(checkAxisMapping("xyzeabc")).toBeNull();
    expect(checkAxisMapping("")).toBeNull();
  });

  it("rejects unknown letters and too many channels", () => {
    expect(checkAxisMapping("XYQ")).toBe(
      "'Q' in axis mapping is neither an axis letter (XYZEABC) nor '_'"
    );
    expect(checkAxisMapping("XYZEABC_")).toBe(
      'axis mapping "XYZEABC_" has more than 7 channels'
    );
  });

  it("stores a valid mapping on the configuration", () => {
    expect(new ConfigurationBuilder().setAxisMapping("_XY").build().axisMapping).toBe("_XY");
    expect(() => new ConfigurationBuilder().setAxisMapping("X1")).toThrow(UsageError);
  });
});

describe("homeSwitchFromNumber", () => {
  it("truncates toward zero", () => {
    expect(homeSwitchFromNumber(0)).toBe("none");
    expect(homeSwitchFromNumber(1.7)).toBe("origin");
    expect(homeSwitchFromNumber(2)).toBe("end-of-range");
    expect(homeSwitchFromNumber(-0.5)).toBe("none");
    expect(homeSwitchFromNumber(-1)).toBeNull();
    expect(homeSwitchFromNumber(NaN)).toBeNull();
  });
});
