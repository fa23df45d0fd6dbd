// src/world/runTool.ts
import { readFile } from "node:fs/promises";

import { type LogFn, processActions } from "./actions.js";
import { errorMessage } from "./errors.js";
import type { WorldMap } from "./worldMap.js";
import { loadWorldMap, saveWorldMap } from "./worldMapFile.js";

/** Action source argument meaning "read actions from standard input". */
export const STDIN_SENTINEL = "-";

export const ExitCode = {
  OK: 0,
  USAGE: 1,
  LOAD_FAILED: 2,
  ACTIONS_UNAVAILABLE: 3,
  ACTIONS_FAILED: 4,
  SAVE_FAILED: 5,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export type RunToolIo = Readonly<{
  log: LogFn;
  error: LogFn;
  warn?: LogFn;
  readStdin: () => Promise<string>;
}>;

export async function readStream(stream: AsyncIterable<Buffer | string>): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
  }
  return Buffer.concat(chunks).toString("utf8");
}

/**
 * Loads inputMap, applies the actions, saves to outputMap. Every failure is
 * reported through io.error and mapped to its exit code; nothing is thrown.
 */
export async function runActionsTool(
  inputMap: string,
  actionSource: string,
  outputMap: string,
  io: RunToolIo,
): Promise<ExitCode> {
  let world: WorldMap;
  try {
    world = await loadWorldMap(inputMap, io.warn);
  } catch (e: unknown) {
    io.error(errorMessage(e));
    return ExitCode.LOAD_FAILED;
  }

  let actions: string;
  try {
    actions =
      actionSource === STDIN_SENTINEL ? await io.readStdin() : await readFile(actionSource, "utf8");
  } catch (e: unknown) {
    io.error(errorMessage(e));
    return ExitCode.ACTIONS_UNAVAILABLE;
  }

  try {
    processActions(actions, world, io.log);
  } catch (e: unknown) {
    io.error(errorMessage(e));
    return ExitCode.ACTIONS_FAILED;
  }

  try {
    await saveWorldMap(world, outputMap);
  } catch (e: unknown) {
    io.error(errorMessage(e));
    return ExitCode.SAVE_FAILED;
  }

  return ExitCode.OK;
}
