// ── Command line surface: option parsing + combination checks ──

import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import { readLeadingNumber } from "./config/axis-array.js";
import { ConfigurationBuilder, homeSwitchToNumber } from "./config/builder.js";
import { UsageError } from "./errors.js";
import { red } from "./log.js";
import {
  AXES,
  DEFAULT_BIND_ADDRESS,
  DEFAULT_PROFILE,
  PROFILE_ENV,
  type FrontEndOptions,
  type HardwareProfile,
} from "./types.js";

export const PROGRAM_NAME = "machine-control";

export type ParseOutcome =
  | { ok: true; options: FrontEndOptions }
  | { ok: false; exitCode: number; message: string };

export interface ParseSettings {
  profile?: HardwareProfile;
  writeOut?: (s: string) => void;
  writeErr?: (s: string) => void;
}

type CliFlags = {
  port?: number;
  bindAddr?: string;
  n?: boolean;
  P?: boolean;
  S?: boolean;
  R?: boolean;
};

const joinAxes = (values: readonly (number | string)[]) => values.join(",");

// Runs a builder step inside commander's option callback; a UsageError
// becomes commander's "argument ... is invalid" error for that option
function applyWith(step: (value: string) => void) {
  return (value: string): string => {
    try {
      step(value);
    } catch (err) {
      if (err instanceof UsageError) throw new InvalidArgumentError(err.message);
      throw err;
    }
    return value;
  };
}

function parsePort(value: string): number {
  if (!/^\s*[+-]?\d+\s*$/.test(value)) {
    throw new InvalidArgumentError(`Invalid port ${value}`);
  }
  return parseInt(value, 10);
}

// atof(): leading number, 0 when there is none
function parseFactor(value: string): number {
  return readLeadingNumber(value)?.value ?? 0;
}

export function buildProgram(
  builder: ConfigurationBuilder,
  settings: ParseSettings = {}
): Command {
  const profile = settings.profile ?? DEFAULT_PROFILE;
  const homeDefaults = profile.homeSwitch.map(homeSwitchToNumber);
  const program = new Command();

  program
    .name(PROGRAM_NAME)
    .description("Feed a GCode stream from a file or a TCP connection to the machine")
    .argument("[gcode-file]", "GCode file to run")
    .addOption(
      new Option("--steps-mm <axis-steps>", `steps/mm, comma separated (Default ${joinAxes(profile.stepsPerMM)})`)
        .argParser(applyWith((v) => builder.setStepsPerMM(v)))
    )
    .addOption(
      new Option("-m, --max-feedrate <rate>", `Max. feedrate per axis (mm/s), comma separated (Default ${joinAxes(profile.maxFeedrate)})`)
        .argParser(applyWith((v) => builder.setMaxFeedrate(v)))
    )
    .addOption(
      new Option("-a, --accel <accel>", `Acceleration per axis (mm/s^2), comma separated; <= 0 is unlimited (Default ${joinAxes(profile.acceleration)})`)
        .argParser(applyWith((v) => builder.setAcceleration(v)))
    )
    .addOption(
      new Option("-r, --range <range-mm>", `Travel range per axis in mm; < 0 is unbounded (Default ${joinAxes(profile.moveRangeMM)})`)
        .argParser(applyWith((v) => builder.setMoveRange(v)))
    )
    .addOption(
      new Option("--home-pos <0/1/2>", `Home switch per axis: 0 = none, 1 = origin, 2 = end-of-range (Default ${joinAxes(homeDefaults)})`)
        .argParser(applyWith((v) => builder.setHomeSwitch(v)))
    )
    .addOption(
      new Option("--axis-mapping <axes>", `Axis letter per motor connector (= string pos); '_' for an empty slot (Default '${profile.axisMapping}')`)
        .argParser(applyWith((v) => builder.setAxisMapping(v)))
    )
    .addOption(
      new Option("-p, --port <port>", "Listen on this TCP port").argParser(parsePort)
    )
    .addOption(
      new Option("-b, --bind-addr <bind-ip>", `Bind to this IP (Default: ${DEFAULT_BIND_ADDRESS})`)
    )
    .addOption(
      new Option("-f <factor>", "Print speed factor (Default 1.0)")
        .argParser(applyWith((v) => builder.setSpeedFactor(parseFactor(v))))
    )
    .addOption(new Option("-n", "Dryrun; don't send to motors"))
    .addOption(new Option("-P", "Verbose: print motor commands"))
    .addOption(new Option("-S", "Synchronous: don't queue"))
    .addOption(new Option("-R", "Repeat file forever"))
    .addHelpText(
      "after",
      `\nAll comma separated axis numerical values are in the sequence ${AXES.join(",")}.\n` +
      "You can either specify --port <port> to listen for commands or give a filename.\n" +
      `Set ${PROFILE_ENV} to a JSON file to change the hardware defaults.\n`
    )
    .showHelpAfterError(true)
    .exitOverride()
    .configureOutput({
      writeOut: settings.writeOut ?? ((s) => process.stdout.write(s)),
      writeErr: settings.writeErr ?? ((s) => process.stderr.write(s)),
      outputError: (s, write) => write(red(s, process.stderr)),
    });

  return program;
}

/**
 * Parse `args` (without node and script path) into the configuration and the
 * single ingress target. Options apply in command line order and the first
 * invalid one stops parsing. Help and every usage error have already been
 * written through the settings' writers when `ok` is false.
 */
export function parseCommandLine(args: string[], settings: ParseSettings = {}): ParseOutcome {
  const builder = new ConfigurationBuilder(settings.profile);
  const program = buildProgram(builder, settings);

  try {
    program.parse(args, { from: "user" });

    const flags = program.opts<CliFlags>();
    const filename: string | undefined = program.args[0];
    const port = flags.port ?? -1;
    const hasFilename = filename !== undefined;

    if (hasFilename === (port > 0)) {
      program.error("Choose one: <gcode-file> or --port <port>.");
    }
    if (!hasFilename && flags.R) {
      program.error("-R (repeat) only makes sense with a filename.");
    }

    builder
      .setDryRun(Boolean(flags.n))
      .setDebugPrint(Boolean(flags.P))
      .setSynchronous(Boolean(flags.S));
    const config = builder.build();

    return {
      ok: true,
      options: {
        config,
        target: hasFilename
          ? { mode: "file", path: filename, repeat: Boolean(flags.R) }
          : { mode: "server", port, bindAddress: flags.bindAddr ?? DEFAULT_BIND_ADDRESS },
      },
    };
  } catch (err) {
    if (err instanceof CommanderError) {
      return { ok: false, exitCode: err.exitCode, message: err.message };
    }
    throw err;
  }
}
