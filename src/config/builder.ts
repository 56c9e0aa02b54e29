// ── Configuration Builder: hardware profile + command line overrides ──

import { UsageError } from "../errors.js";
import {
  AXES,
  AXIS_COUNT,
  DEFAULT_PROFILE,
  HOME_SWITCHES,
  type HardwareProfile,
  type HomeSwitch,
  type MachineConfiguration,
} from "../types.js";
import { parseAxisOverride } from "./axis-array.js";

const UNUSED_CHANNEL = "_";

export function homeSwitchFromNumber(value: number): HomeSwitch | null {
  const index = Math.trunc(value);
  return Number.isInteger(index) && index >= 0 && index < HOME_SWITCHES.length
    ? HOME_SWITCHES[index]
    : null;
}

export function homeSwitchToNumber(value: HomeSwitch): number {
  return HOME_SWITCHES.indexOf(value);
}

// Returns a reason when the mapping is unusable, null otherwise
export function checkAxisMapping(mapping: string): string | null {
  if (mapping.length > AXIS_COUNT) {
    return `axis mapping "${mapping}" has more than ${AXIS_COUNT} channels`;
  }
  const letters: readonly string[] = AXES;
  for (const ch of mapping) {
    if (ch !== UNUSED_CHANNEL && !letters.includes(ch.toUpperCase())) {
      return `'${ch}' in axis mapping is neither an axis letter (${AXES.join("")}) nor '${UNUSED_CHANNEL}'`;
    }
  }
  return null;
}

export class ConfigurationBuilder {
  private stepsPerMM: number[];
  private maxFeedrate: number[];
  private acceleration: number[];
  private moveRangeMM: number[];
  private homeSwitch: HomeSwitch[];
  private channelLayout: string;
  private axisMapping: string;
  private speedFactor = 1;
  private dryRun = false;
  private debugPrint = false;
  private synchronous = false;

  constructor(profile: HardwareProfile = DEFAULT_PROFILE) {
    this.stepsPerMM = [...profile.stepsPerMM];
    this.maxFeedrate = [...profile.maxFeedrate];
    this.acceleration = [...profile.acceleration];
    this.moveRangeMM = [...profile.moveRangeMM];
    this.homeSwitch = [...profile.homeSwitch];
    this.channelLayout = profile.channelLayout;
    this.axisMapping = profile.axisMapping;
  }

  setStepsPerMM(list: string): this {
    this.stepsPerMM = this.override(list, this.stepsPerMM, "steps/mm failed to parse.");
    return this;
  }

  setMaxFeedrate(list: string): this {
    this.maxFeedrate = this.override(list, this.maxFeedrate, "max-feedrate missing.");
    return this;
  }

  // Values <= 0 are kept as they are: the engine reads them as unlimited
  setAcceleration(list: string): this {
    this.acceleration = this.override(list, this.acceleration, "Acceleration missing.");
    return this;
  }

  setMoveRange(list: string): this {
    this.moveRangeMM = this.override(list, this.moveRangeMM, "Failed to parse ranges.");
    return this;
  }

  setHomeSwitch(list: string): this {
    const current = this.homeSwitch.map(homeSwitchToNumber);
    const numbers = this.override(list, current, "Failed to parse home switch.");
    const switches: HomeSwitch[] = [];
    for (const n of numbers) {
      const home = homeSwitchFromNumber(n);
      if (home === null) {
        throw new UsageError(`Failed to parse home switch: ${n} is not 0, 1 or 2.`);
      }
      switches.push(home);
    }
    this.homeSwitch = switches;
    return this;
  }

  setAxisMapping(mapping: string): this {
    const problem = checkAxisMapping(mapping);
    if (problem) throw new UsageError(`Invalid axis mapping: ${problem}.`);
    this.axisMapping = mapping;
    return this;
  }

  setSpeedFactor(factor: number): this {
    if (!(factor > 0)) throw new UsageError("Speedfactor cannot be <= 0");
    this.speedFactor = factor;
    return this;
  }

  setDryRun(on = true): this {
    this.dryRun = on;
    return this;
  }

  setDebugPrint(on = true): this {
    this.debugPrint = on;
    return this;
  }

  setSynchronous(on = true): this {
    this.synchronous = on;
    return this;
  }

  build(): MachineConfiguration {
    return Object.freeze({
      stepsPerMM: Object.freeze([...this.stepsPerMM]),
      maxFeedrate: Object.freeze([...this.maxFeedrate]),
      acceleration: Object.freeze([...this.acceleration]),
      moveRangeMM: Object.freeze([...this.moveRangeMM]),
      homeSwitch: Object.freeze([...this.homeSwitch]),
      channelLayout: this.channelLayout,
      axisMapping: this.axisMapping,
      speedFactor: this.speedFactor,
      dryRun: this.dryRun,
      debugPrint: this.debugPrint,
      synchronous: this.synchronous,
    });
  }

  private override(list: string, current: readonly number[], failure: string): number[] {
    const { count, values } = parseAxisOverride(list, current);
    if (count === 0) throw new UsageError(failure);
    return values;
  }
}
