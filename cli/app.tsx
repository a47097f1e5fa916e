/**
 * Root component of the terminal preview.
 *
 * Plays one animation on a loop, or the configured playlist when no
 * animation was named, and draws each frame the engine pushes.
 *
 * Data flow:
 *   Engine tick -> DisplayDriver -> React state -> MatrixCanvas
 *   Keys -> engine (pause, fps)
 */

import React, { useMemo } from "react";
import { Box, useApp, useInput } from "ink";

import { ANIMATIONS } from "../lib/animation/algorithms/index.js";
import { AnimationPriority, type AnimationName, type AnimationSlot } from "../lib/animation/types.js";
import { buildPlaylistSlots, type MatrixConfig } from "../lib/config/config.js";

import { MatrixCanvas } from "./components/MatrixCanvas.js";
import { StatusBar } from "./components/StatusBar.js";
import { useMatrixEngine } from "./hooks/useMatrixEngine.js";

export interface AppProps {
  config: MatrixConfig;
  /** Animation to loop; the playlist runs when omitted. */
  animation?: AnimationName;
  frames?: number;
  size?: number;
  braille?: boolean;
}

function singleSlot(name: AnimationName, config: MatrixConfig, frames?: number, size?: number): AnimationSlot {
  const definition = ANIMATIONS[name];
  const frameCount = frames ?? definition.defaultFrameCount;
  return {
    renderer: definition.create({ brightness: 255, size }),
    frameCount,
    priority: AnimationPriority.OVERRIDE,
    duration: frameCount,
    brightness: config.brightness,
    label: name,
  };
}

export function App({ config, animation, frames, size, braille = false }: AppProps) {
  const { exit } = useApp();

  const slots = useMemo(
    () => (animation ? [singleSlot(animation, config, frames, size)] : buildPlaylistSlots(config)),
    [animation, config, frames, size],
  );
  const { frame, label, fps, paused, togglePause, changeFps } = useMatrixEngine({
    slots,
    fps: config.fps,
  });

  useInput((input, key) => {
    if (input === "q" || key.escape) {
      exit();
    } else if (input === " ") {
      togglePause();
    } else if (input === "+" || input === "=") {
      changeFps(1);
    } else if (input === "-") {
      changeFps(-1);
    }
  });

  return (
    <Box flexDirection="column">
      <MatrixCanvas frame={frame} braille={braille} />
      <StatusBar label={label} fps={fps} brightness={config.brightness} paused={paused} />
    </Box>
  );
}
