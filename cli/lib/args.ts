/**
 * Command-line argument parsing for the glyph-matrix CLI.
 *
 * Accepts `--flag value` and `--flag=value`. A bare animation name as the
 * first argument is shorthand for `play <animation>`.
 */

import { isAnimationName } from "../../lib/animation/algorithms/index.js";
import type { AnimationName } from "../../lib/animation/types.js";

export interface CliFlags {
  frames?: number;
  fps?: number;
  brightness?: number;
  size?: number;
  config?: string;
  braille: boolean;
}

/** `play` without an animation runs the configured playlist. */
export type CliCommand =
  | { command: "play"; animation?: AnimationName }
  | { command: "export"; animation: AnimationName }
  | { command: "show"; path: string }
  | { command: "list" }
  | { command: "help" };

export type Command = CliCommand["command"];

export type CliOptions = CliCommand & CliFlags;

const COMMANDS: readonly Command[] = ["play", "export", "show", "list", "help"];

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export const USAGE = `glyph-matrix -- animations for the 25-row glyph matrix

Usage:
  glyph-matrix play [animation]     Preview in the terminal (playlist when omitted)
  glyph-matrix export <animation>   Print each frame as a 625-value pixel string
  glyph-matrix show <file>          Preview a pixel-string file
  glyph-matrix list                 List animations

Options:
  --frames <n>       Frames per cycle
  --fps <n>          Playback rate (default 10)
  --brightness <n>   Theme brightness 0-255
  --size <n>         Line length, pulse radius or wave amplitude
  --config <path>    YAML config (default ./glyph-matrix.yml)
  --braille          Compact braille preview
  -h, --help         Show this help`;

const INT_FLAGS = ["frames", "fps", "brightness"] as const;
type IntFlag = (typeof INT_FLAGS)[number];

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

function isIntFlag(name: string): name is IntFlag {
  return INT_FLAGS.some((f) => f === name);
}

function parseNumber(flag: string, raw: string | undefined, integer: boolean): number {
  if (raw === undefined || raw.startsWith("--")) {
    throw new UsageError(`--${flag} needs a value`);
  }
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(value) || (integer && !Number.isInteger(value))) {
    throw new UsageError(`--${flag} expects ${integer ? "an integer" : "a number"}, got "${raw}"`);
  }
  return value;
}

export function parseArgs(argv: readonly string[]): CliOptions {
  const flags: CliFlags = { braille: false };
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "-h" || arg === "--help") {
      return { command: "help", braille: false };
    }
    if (!arg.startsWith("--")) {
      positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf("=");
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    const inline = eq === -1 ? undefined : arg.slice(eq + 1);
    const takeValue = (): string | undefined => (inline !== undefined ? inline : argv[++i]);

    if (name === "braille") {
      flags.braille = true;
    } else if (name === "config") {
      const value = takeValue();
      if (value === undefined || value === "") throw new UsageError("--config needs a path");
      flags.config = value;
    } else if (name === "size") {
      flags.size = parseNumber(name, takeValue(), false);
    } else if (isIntFlag(name)) {
      flags[name] = parseNumber(name, takeValue(), true);
    } else {
      throw new UsageError(`Unknown option --${name}`);
    }
  }

  const command = parseCommand(positionals);
  validateFlags(flags);
  return { ...command, ...flags };
}

function toAnimation(name: string): AnimationName {
  if (!isAnimationName(name)) {
    throw new UsageError(`Unknown animation "${name}"`);
  }
  return name;
}

function parseCommand(positionals: readonly string[]): CliCommand {
  const [first, ...rest] = positionals;
  const target = isCommand(first) ? rest.shift() : first;
  if (rest.length > 0) {
    throw new UsageError(`Unexpected argument "${rest[0]}"`);
  }

  const command: Command = isCommand(first) ? first : "play";
  switch (command) {
    case "play":
      return target === undefined ? { command } : { command, animation: toAnimation(target) };
    case "export":
      if (target === undefined) throw new UsageError("export needs an animation name");
      return { command, animation: toAnimation(target) };
    case "show":
      if (target === undefined) throw new UsageError("show needs a file path");
      return { command, path: target };
    case "list":
    case "help":
      if (target !== undefined) throw new UsageError(`Unexpected argument "${target}"`);
      return { command };
  }
}

function validateFlags(flags: CliFlags): void {
  if (flags.frames !== undefined && flags.frames < 1) {
    throw new UsageError("--frames must be at least 1");
  }
  if (flags.fps !== undefined && flags.fps < 1) {
    throw new UsageError("--fps must be at least 1");
  }
}
