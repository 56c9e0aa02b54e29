// ── Shared Types ──

export const AXES = ["X", "Y", "Z", "E", "A", "B", "C"] as const;
export type Axis = typeof AXES[number];
export const AXIS_COUNT = AXES.length;

export const HOME_SWITCHES = ["none", "origin", "end-of-range"] as const;
export type HomeSwitch = typeof HOME_SWITCHES[number];

export interface MachineConfiguration {
  readonly stepsPerMM: readonly number[];
  readonly maxFeedrate: readonly number[];
  // <= 0 means unlimited
  readonly acceleration: readonly number[];
  // < 0 means unbounded
  readonly moveRangeMM: readonly number[];
  readonly homeSwitch: readonly HomeSwitch[];
  readonly channelLayout: string;
  readonly axisMapping: string;
  readonly speedFactor: number;
  readonly dryRun: boolean;
  readonly debugPrint: boolean;
  readonly synchronous: boolean;
}

export interface HardwareProfile {
  stepsPerMM: readonly number[];
  maxFeedrate: readonly number[];
  acceleration: readonly number[];
  homeSwitch: readonly HomeSwitch[];
  moveRangeMM: readonly number[];
  channelLayout: string;
  axisMapping: string;
}

// All arrays in sequence X,Y,Z,E,A,B,C
export const DEFAULT_PROFILE: HardwareProfile = {
  stepsPerMM: [160, 160, 160, 40, 1, 0, 0],
  maxFeedrate: [200, 200, 90, 10, 1, 0, 0],
  acceleration: [4000, 4000, 1000, 10000, 1, 0, 0],
  homeSwitch: ["origin", "origin", "origin", "none", "none", "none", "none"],
  moveRangeMM: [100, 100, 100, -1, -1, -1, -1],
  // Motor connector order on the driver cape
  channelLayout: "23140",
  axisMapping: "XYZEA",
};

export type IngressTarget =
  | { mode: "file"; path: string; repeat: boolean }
  | { mode: "server"; port: number; bindAddress: string };

export interface FrontEndOptions {
  config: MachineConfiguration;
  target: IngressTarget;
}

export const DEFAULT_BIND_ADDRESS = "0.0.0.0";
export const LISTEN_BACKLOG = 2;

export const PROFILE_ENV = "MACHINE_CONTROL_PROFILE";
