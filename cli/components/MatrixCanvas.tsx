/**
 * Terminal rendering of one matrix frame.
 *
 * Full layout draws one character per pixel; braille packs 2x4 pixels into
 * each character for narrow terminals.
 */

import React, { useMemo } from 'react'
import { Box, Text } from 'ink'

import { renderBrailleLines, renderMatrixLines } from '../../lib/preview/matrix-preview.js'

export interface MatrixCanvasProps {
  frame: readonly number[]
  braille?: boolean
  /** Theme brightness still to apply to `frame` when tinting. Engine output is already scaled. */
  themeBrightness?: number
}

export function MatrixCanvas({
  frame,
  braille = false,
  themeBrightness = 255,
}: MatrixCanvasProps): React.ReactElement {
  const lines = useMemo(
    () => (braille ? renderBrailleLines : renderMatrixLines)(frame, { themeBrightness }),
    [frame, braille, themeBrightness],
  )

  return (
    <Box flexDirection="column">
      {lines.map((line, i) => (
        <Text key={i}>{line}</Text>
      ))}
    </Box>
  )
}
