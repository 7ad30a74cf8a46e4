/**
 * Status bar / footer rendered below the board.
 *
 * Shows:
 * - Key hints for the active context
 * - Run state, generation and population
 */

import React from "react";
import { Box, Text } from "ink";

import { getFooterHints } from "@/lib/keys/bindings.js";
import type { ViewContext } from "@/lib/keys/types.js";
import { runStateColor, statusBarFg, themeText } from "@/lib/theme/ink-colors.js";

interface FooterProps {
  viewContext: ViewContext;
  width: number;
  paused: boolean;
  penDown: boolean;
  generation: number;
  population: number;
}

export function Footer({ viewContext, width, paused, penDown, generation, population }: FooterProps) {
  const hints = getFooterHints(viewContext);
  const fgFn = statusBarFg();
  const muted = themeText("muted");

  const stateLabel = paused ? "Paused (Space/P to run)" : "Running";

  return (
    <Box flexDirection="column">
      <Text dimColor>{"─".repeat(Math.max(20, width))}</Text>

      <Box flexDirection="row" gap={1}>
        {hints.map((hint, i) => (
          <Text key={i}>
            {fgFn(`[${hint.key}]`)} <Text dimColor>{hint.description}</Text>
          </Text>
        ))}
      </Box>

      <Box flexDirection="row" gap={2}>
        <Text>{runStateColor(paused)(stateLabel)}</Text>
        <Text>{muted(`gen ${generation}`)}</Text>
        <Text>{muted(`pop ${population}`)}</Text>
        {penDown ? <Text>{fgFn("pen down")}</Text> : null}
      </Box>
    </Box>
  );
}
