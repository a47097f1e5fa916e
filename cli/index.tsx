#!/usr/bin/env node
/**
 * Entry point for the glyph-matrix command-line tool.
 *
 * `play` renders the Ink preview in the terminal; the other commands print
 * and exit.
 */

import React from "react";
import { render } from "ink";

import { loadConfig, type MatrixConfig } from "../lib/config/config.js";
import { clampBrightness } from "../lib/matrix/mapper.js";

import { App } from "./app.js";
import { runExport, runList, runShow, EXIT_FAILURE, EXIT_OK } from "./commands.js";
import { parseArgs, UsageError, USAGE, type CliFlags, type CliOptions } from "./lib/args.js";

const out = (line: string) => process.stdout.write(line + "\n");
const err = (line: string) => process.stderr.write(line + "\n");

function withFlags(config: MatrixConfig, options: CliFlags): MatrixConfig {
  return {
    ...config,
    fps: options.fps ?? config.fps,
    brightness: options.brightness !== undefined ? clampBrightness(options.brightness) : config.brightness,
  };
}

async function main(argv: string[]): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      err(error.message);
      err(USAGE);
      return EXIT_FAILURE;
    }
    throw error;
  }

  if (options.command === "help") {
    out(USAGE);
    return EXIT_OK;
  }
  if (options.command === "list") {
    return runList(out);
  }

  const config = loadConfig({ path: options.config });

  if (options.command === "export") {
    return runExport(options.animation, options, config, out);
  }
  if (options.command === "show") {
    return runShow(options.path, options, config, out, err);
  }

  const { waitUntilExit } = render(
    <App
      config={withFlags(config, options)}
      animation={options.animation}
      frames={options.frames}
      size={options.size}
      braille={options.braille}
    />,
    { patchConsole: false },
  );
  await waitUntilExit();
  return EXIT_OK;
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exit(code);
  },
  (error: unknown) => {
    err(error instanceof Error ? error.message : String(error));
    process.exit(EXIT_FAILURE);
  },
);
