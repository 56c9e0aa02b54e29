// ── Hardware Profile: compiled-in defaults, optionally patched from a JSON file ──

import { existsSync, readFileSync } from "node:fs";
import { UsageError, errorMessage } from "../errors.js";
import {
  AXIS_COUNT,
  DEFAULT_PROFILE,
  HOME_SWITCHES,
  PROFILE_ENV,
  type HardwareProfile,
  type HomeSwitch,
} from "../types.js";
import { checkAxisMapping } from "./builder.js";

const AXIS_ARRAY_KEYS = ["stepsPerMM", "maxFeedrate", "acceleration", "moveRangeMM"] as const;

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((v) => typeof v === "number" && !Number.isNaN(v));
}

const HOME_SWITCH_NAMES: readonly string[] = HOME_SWITCHES;

function isHomeSwitch(value: unknown): value is HomeSwitch {
  return typeof value === "string" && HOME_SWITCH_NAMES.includes(value);
}

// Profile arrays follow the command line rule: leading entries replace, the rest stay
function prefixFill<T>(base: readonly T[], patch: readonly T[]): T[] {
  const out = [...base];
  patch.slice(0, AXIS_COUNT).forEach((v, i) => {
    out[i] = v;
  });
  return out;
}

export function applyProfilePatch(base: HardwareProfile, raw: unknown): HardwareProfile {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new UsageError("Hardware profile must be a JSON object");
  }
  const patch = raw as Record<string, unknown>;
  const profile: HardwareProfile = { ...base };

  for (const key of AXIS_ARRAY_KEYS) {
    const value = patch[key];
    if (value === undefined) continue;
    if (!isNumberArray(value) || value.length === 0) {
      throw new UsageError(`Hardware profile: "${key}" must be a non-empty array of numbers`);
    }
    profile[key] = prefixFill(base[key], value);
  }

  if (patch.homeSwitch !== undefined) {
    const value = patch.homeSwitch;
    if (!Array.isArray(value) || value.length === 0 || !value.every(isHomeSwitch)) {
      throw new UsageError(
        `Hardware profile: "homeSwitch" must list ${HOME_SWITCHES.join(" | ")}`
      );
    }
    profile.homeSwitch = prefixFill(base.homeSwitch, value);
  }

  if (patch.channelLayout !== undefined) {
    if (typeof patch.channelLayout !== "string" || !/^\d+$/.test(patch.channelLayout)) {
      throw new UsageError('Hardware profile: "channelLayout" must be a string of digits');
    }
    profile.channelLayout = patch.channelLayout;
  }

  if (patch.axisMapping !== undefined) {
    if (typeof patch.axisMapping !== "string") {
      throw new UsageError('Hardware profile: "axisMapping" must be a string');
    }
    const problem = checkAxisMapping(patch.axisMapping);
    if (problem) throw new UsageError(`Hardware profile: ${problem}`);
    profile.axisMapping = patch.axisMapping;
  }

  return profile;
}

export function loadProfile(path: string, base: HardwareProfile = DEFAULT_PROFILE): HardwareProfile {
  if (!existsSync(path)) {
    throw new UsageError(`Hardware profile not found: ${path}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new UsageError(`Cannot read hardware profile ${path}: ${errorMessage(err)}`);
  }
  return applyProfilePatch(base, raw);
}

export function resolveProfile(env: NodeJS.ProcessEnv = process.env): HardwareProfile {
  const path = env[PROFILE_ENV];
  return path ? loadProfile(path) : DEFAULT_PROFILE;
}
