/**
 * Non-interactive CLI commands: list, export and show.
 *
 * Each command writes lines through an injectable writer and returns a
 * process exit code, so tests can run them without touching stdout.
 */

import { readFileSync } from "fs";

import { ANIMATIONS, ANIMATION_NAMES, renderSequence } from "../lib/animation/algorithms/index.js";
import type { AnimationName } from "../lib/animation/types.js";
import type { MatrixConfig } from "../lib/config/config.js";
import { applyThemeBrightness } from "../lib/matrix/brightness.js";
import { isMatrixError } from "../lib/matrix/errors.js";
import { clampBrightness, flatArrayToPixelString, parsePixelString } from "../lib/matrix/mapper.js";
import { renderBrailleLines, renderMatrixLines, type PreviewOptions } from "../lib/preview/matrix-preview.js";
import type { CliFlags } from "./lib/args.js";

export type LineWriter = (line: string) => void;

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

function themeBrightness(options: CliFlags, config: MatrixConfig): number {
  return options.brightness !== undefined ? clampBrightness(options.brightness) : config.brightness;
}

// ---------------------------------------------------------------------------
// list
// ---------------------------------------------------------------------------

export function runList(out: LineWriter): number {
  const width = Math.max(...ANIMATION_NAMES.map((name) => name.length));
  for (const name of ANIMATION_NAMES) {
    const def = ANIMATIONS[name];
    out(`${name.padEnd(width)}  ${def.description} (${def.defaultFrameCount} frames)`);
  }
  return EXIT_OK;
}

// ---------------------------------------------------------------------------
// export
// ---------------------------------------------------------------------------

/** Print every frame of one cycle as a pixel string, one per line. */
export function runExport(
  name: AnimationName,
  options: CliFlags,
  config: MatrixConfig,
  out: LineWriter,
): number {
  const definition = ANIMATIONS[name];
  const frameCount = options.frames ?? definition.defaultFrameCount;
  const theme = themeBrightness(options, config);

  const frames = renderSequence(definition, frameCount, { brightness: 255, size: options.size });
  for (const frame of frames) {
    out(flatArrayToPixelString(applyThemeBrightness(frame, theme)));
  }
  return EXIT_OK;
}

// ---------------------------------------------------------------------------
// show
// ---------------------------------------------------------------------------

/** Preview a file holding one pixel string. */
export function runShow(
  path: string,
  options: CliFlags,
  config: MatrixConfig,
  out: LineWriter,
  err: LineWriter,
  preview: Omit<PreviewOptions, "themeBrightness"> = {},
): number {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    err(`Cannot read ${path}: ${message}`);
    return EXIT_FAILURE;
  }

  try {
    const frame = parsePixelString(text);
    const render = options.braille ? renderBrailleLines : renderMatrixLines;
    for (const line of render(frame, { ...preview, themeBrightness: themeBrightness(options, config) })) {
      out(line);
    }
    return EXIT_OK;
  } catch (error) {
    if (isMatrixError(error)) {
      err(`${path}: ${error.message}`);
      return EXIT_FAILURE;
    }
    throw error;
  }
}
