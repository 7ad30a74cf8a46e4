/**
 * Entry point for the lifeboard terminal application.
 *
 * Builds the engine and driver from configuration, seeds the starting
 * pattern, and renders the root App component. On exit the live region is
 * written to stdout as pattern text, ready to paste back.
 * Uses React 18 -- Ink 5.x.
 */

import React from "react";
import { render } from "ink";

import { loadLifeConfig } from "@/lib/config/config.js";
import { LifeDriver } from "@/lib/life/driver.js";
import { LifeEngine } from "@/lib/life/engine.js";
import { formatPattern } from "@/lib/life/pattern.js";
import { lifeStore } from "@/lib/store/index.js";

import { App } from "./app.js";
import { seedBoard } from "./lib/seed.js";

const config = loadLifeConfig();
const engine = new LifeEngine(config.width, config.height);
const driver = new LifeDriver(engine, { fps: config.fps, paused: config.paused });
seedBoard(engine, config);
lifeStore.getState().dispatch({ type: "INIT_BOARD", board: engine.size, paused: driver.paused });

const { waitUntilExit } = render(<App engine={engine} driver={driver} config={config} />, {
  patchConsole: false,
});

waitUntilExit()
  .then(() => {
    driver.destroy();
    const text = formatPattern(engine);
    if (text) {
      process.stdout.write(`${text}\n`);
    }
    process.exit(0);
  })
  .catch((err: unknown) => {
    console.error("[life] Terminal app exited with an error:", err);
    process.exit(1);
  });
