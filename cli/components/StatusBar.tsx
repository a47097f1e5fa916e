/**
 * Footer under the matrix preview: current animation, rate and key hints.
 */

import React from "react";
import { Box, Text } from "ink";

interface StatusBarProps {
  label: string | undefined;
  fps: number;
  brightness: number;
  paused: boolean;
}

const HINTS = [
  { key: "space", description: "pause" },
  { key: "+/-", description: "fps" },
  { key: "q", description: "quit" },
];

export function StatusBar({ label, fps, brightness, paused }: StatusBarProps) {
  return (
    <Box flexDirection="column">
      <Text dimColor>{"─".repeat(25)}</Text>
      <Text>
        {label ?? "idle"} <Text dimColor>{fps} fps, brightness {brightness}</Text>
        {paused ? <Text color="yellow"> paused</Text> : null}
      </Text>
      <Box flexDirection="row" gap={1}>
        {HINTS.map((hint) => (
          <Text key={hint.key}>
            [{hint.key}] <Text dimColor>{hint.description}</Text>
          </Text>
        ))}
      </Box>
    </Box>
  );
}
