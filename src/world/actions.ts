// src/world/actions.ts
//
// Line-oriented commands applied to a loaded world:
//
//   MOVE_BUILDER <direction>
//   MOVE_BLOCK <direction>
//   DIG
//   DROP <inventory index>

import { isDirection } from "./direction.js";
import { ActionFormatError, BlockWorldError, NoExitError } from "./errors.js";
import { LineReader } from "./lines.js";
import type { WorldMap } from "./worldMap.js";

export type LogFn = (msg: string) => void;

export type Action =
  | Readonly<{ kind: "MOVE_BUILDER"; direction: string }>
  | Readonly<{ kind: "MOVE_BLOCK"; direction: string }>
  | Readonly<{ kind: "DIG" }>
  | Readonly<{ kind: "DROP"; index: number }>;

const INDEX_RE = /^\d+$/;

export function parseAction(line: string, lineNumber?: number): Action {
  const parts = line.split(" ");
  const [name, arg, ...extra] = parts;

  if (extra.length > 0) throw new ActionFormatError(`Too many arguments in '${line}'`, lineNumber);

  switch (name) {
    case "MOVE_BUILDER":
    case "MOVE_BLOCK":
      if (arg === undefined || arg === "") {
        throw new ActionFormatError(`${name} needs a direction`, lineNumber);
      }
      return { kind: name, direction: arg };

    case "DIG":
      if (arg !== undefined) throw new ActionFormatError("DIG takes no argument", lineNumber);
      return { kind: "DIG" };

    case "DROP":
      if (arg === undefined || !INDEX_RE.test(arg)) {
        throw new ActionFormatError("DROP needs an inventory index", lineNumber);
      }
      return { kind: "DROP", index: Number(arg) };

    default:
      throw new ActionFormatError(`Unknown action '${line}'`, lineNumber);
  }
}

/**
 * Applies one action and returns the message describing what happened.
 * Block-world rule violations are reported in the message, not thrown.
 */
export function processAction(action: Action, world: WorldMap): string {
  const builder = world.getBuilder();

  try {
    switch (action.kind) {
      case "MOVE_BUILDER": {
        if (!isDirection(action.direction)) return "Error: Invalid action";
        const target = builder.getCurrentTile().getExits().get(action.direction);
        if (!target) throw new NoExitError();
        builder.moveTo(target);
        return `Moved builder ${action.direction}`;
      }

      case "MOVE_BLOCK":
        if (!isDirection(action.direction)) return "Error: Invalid action";
        builder.getCurrentTile().moveBlock(action.direction);
        return `Moved block ${action.direction}`;

      case "DIG":
        builder.digOnCurrentTile();
        return "Top block on current tile removed";

      case "DROP":
        builder.dropFromInventory(action.index);
        return "Dropped a block from inventory";
    }
  } catch (e: unknown) {
    if (e instanceof BlockWorldError) return e.message;
    throw e;
  }
}

/**
 * Runs every action line in order, logging one message per action.
 *
 * @throws ActionFormatError on the first malformed line; earlier actions
 *         stay applied.
 */
export function processActions(text: string, world: WorldMap, log: LogFn = () => {}): number {
  const r = new LineReader(text);
  let count = 0;

  while (!r.atEnd()) {
    const n = r.lineNumber();
    const action = parseAction(r.readLine(), n);
    log(processAction(action, world));
    count++;
  }
  return count;
}
