import { describe, expect, it } from "vitest";

import {
  WorldMapFormatError,
  WorldMapInconsistentError,
} from "../src/world/errors.js";
import { Position } from "../src/world/position.js";
import { decodeWorldMap } from "../src/world/worldMapCodec.js";

function text(lines: ReadonlyArray<string>): string {
  return lines.join("\n") + "\n";
}

type Sections = {
  start?: [string, string];
  name?: string;
  inventory?: string;
  total?: string;
  tiles: string[];
  exitsHeader?: string;
  exits: string[];
};

// Lines 1-5 are the builder section and its blank line; "total" is line 6.
function mapText(s: Sections): string {
  return text([
    ...(s.start ?? ["0", "0"]),
    s.name ?? "Bob",
    s.inventory ?? "",
    "",
    s.total ?? `total:${s.tiles.length}`,
    ...s.tiles,
    "",
    s.exitsHeader ?? "exits",
    ...s.exits,
  ]);
}

function expectFormatError(src: string, message?: string): void {
  expect(() => decodeWorldMap(src)).toThrow(WorldMapFormatError);
  if (message !== undefined) expect(() => decodeWorldMap(src)).toThrow(message);
}

describe("decodeWorldMap: builder section", () => {
  it("reads the start position, name and inventory", () => {
    const world = decodeWorldMap(
      mapText({ start: ["-4", "9"], name: "Bob the Builder", inventory: "wood,soil", tiles: ["0"], exits: ["0"] }),
    );
    expect(world.getStartPosition().equals(new Position(-4, 9))).toBe(true);
    expect(world.getBuilder().getName()).toBe("Bob the Builder");
    expect(world.getBuilder().getInventory().map((b) => b.kind)).toEqual(["wood", "soil"]);
    expect(world.getBuilder().getCurrentTile()).toBe(world.getTiles()[0]);
  });

  it("accepts an empty inventory line and an empty name", () => {
    const world = decodeWorldMap(mapText({ name: "", inventory: "", tiles: ["0"], exits: ["0"] }));
    expect(world.getBuilder().getInventory().length).toBe(0);
    expect(world.getBuilder().getName()).toBe("");
  });

  it("rejects inventory blocks that cannot be carried", () => {
    expectFormatError(mapText({ inventory: "wood,stone", tiles: ["0"], exits: ["0"] }), "line 4:");
    expectFormatError(mapText({ inventory: "grass", tiles: ["0"], exits: ["0"] }));
  });

  it("rejects unknown inventory tokens", () => {
    expectFormatError(
      mapText({ inventory: "wood,gold", tiles: ["0"], exits: ["0"] }),
      "line 4: Unknown block type 'gold'",
    );
  });

  it("rejects bad start coordinates", () => {
    expectFormatError(mapText({ start: ["x", "0"], tiles: ["0"], exits: ["0"] }), "line 1:");
    expectFormatError(mapText({ start: ["0", "2147483648"], tiles: ["0"], exits: ["0"] }), "line 2:");
    expectFormatError(mapText({ start: ["0", " 1"], tiles: ["0"], exits: ["0"] }));
  });

  it("requires the blank separator lines", () => {
    expectFormatError(text(["0", "0", "Bob", "", "total:1", "0", "", "exits", "0"]), "line 5: Expected a blank line");
    expectFormatError(text(["0", "0", "Bob", "", "", "total:1", "0", "exits", "0"]), "line 8: Expected a blank line");
    expectFormatError(text(["0", "0", "Bob", "", "", "total:1", "0", " ", "exits", "0"]), "Expected a blank line");
  });

  it("rejects input that ends early", () => {
    expectFormatError("", "line 1: Unexpected end of input");
    expectFormatError(text(["0", "0", "Bob"]), "line 4: Unexpected end of input");
  });
});

describe("decodeWorldMap: tiles section", () => {
  it("needs exactly 'total:N' with N >= 1", () => {
    expectFormatError(mapText({ total: "total:0", tiles: [], exits: [] }), "line 6: A map needs at least one tile");
    expectFormatError(mapText({ total: "count:1", tiles: ["0"], exits: ["0"] }), "line 6: Expected 'total:N'");
    expectFormatError(mapText({ total: "total:1,extra:1", tiles: ["0"], exits: ["0"] }));
    expectFormatError(mapText({ total: "Total:1", tiles: ["0"], exits: ["0"] }));
    expectFormatError(mapText({ total: "total:-1", tiles: ["0"], exits: ["0"] }));
  });

  it("accepts tile rows in any order", () => {
    const world = decodeWorldMap(
      mapText({ tiles: ["1 stone", "0 wood"], exits: ["1 west:0", "0 east:1"] }),
    );
    const [t0, t1] = world.getTiles();
    expect(t0?.getBlocks().map((b) => b.kind)).toEqual(["wood"]);
    expect(t1?.getBlocks().map((b) => b.kind)).toEqual(["stone"]);
  });

  it("rejects a repeated tile id", () => {
    expectFormatError(
      mapText({ tiles: ["0", "3", "1", "3"], exits: ["0", "1", "2", "3"] }),
      "line 10: Duplicate tile id 3",
    );
  });

  it("rejects tile ids outside [0, N)", () => {
    expectFormatError(mapText({ tiles: ["0", "2"], exits: ["0", "1"] }), "line 8: Tile id 2 outside [0, 2)");
    expectFormatError(mapText({ tiles: ["-1", "0"], exits: ["0", "1"] }), "line 7:");
  });

  it("rejects more than one space in a tile row", () => {
    expectFormatError(mapText({ tiles: ["0 wood soil"], exits: ["0"] }), "line 7: Too many spaces");
  });

  it("rejects a third ground block, on the starting tile or any other", () => {
    expectFormatError(mapText({ tiles: ["0 soil,soil,soil"], exits: ["0"] }), "line 7: Tile 0 stacks its blocks too high");
    expectFormatError(
      mapText({ tiles: ["0", "1 soil,grass,soil"], exits: ["0", "1"] }),
      "line 8: Tile 1 stacks its blocks too high",
    );
  });

  it("accepts seven regular blocks and rejects eight", () => {
    const seven = "wood,wood,stone,wood,wood,stone,wood";
    const world = decodeWorldMap(mapText({ tiles: [`0 ${seven}`], exits: ["0"] }));
    expect(world.getTiles()[0]?.height()).toBe(7);

    expectFormatError(mapText({ tiles: [`0 ${seven},wood`], exits: ["0"] }));
    expectFormatError(mapText({ tiles: ["0", `1 ${seven},stone`], exits: ["0", "1"] }));
  });

  it("rejects unknown block tokens in a tile row", () => {
    expectFormatError(mapText({ tiles: ["0 Wood"], exits: ["0"] }), "line 7: Unknown block type 'Wood'");
  });
});

describe("decodeWorldMap: exits section", () => {
  it("requires the literal 'exits'", () => {
    expectFormatError(mapText({ tiles: ["0"], exitsHeader: "Exits", exits: ["0"] }), "line 9: Expected 'exits'");
    expectFormatError(mapText({ tiles: ["0"], exitsHeader: "exits ", exits: ["0"] }));
  });

  it("rejects wrong-case and unknown directions", () => {
    expectFormatError(mapText({ tiles: ["0", "1"], exits: ["0 North:1", "1"] }), "line 11: Invalid field 'North:1'");
    expectFormatError(mapText({ tiles: ["0", "1"], exits: ["0 up:1", "1"] }), "line 11: Invalid direction 'up'");
  });

  it("rejects a repeated direction on one row", () => {
    expectFormatError(
      mapText({ tiles: ["0", "1"], exits: ["0 north:1,north:1", "1"] }),
      "line 11: Repeated label 'north'",
    );
  });

  it("rejects exit targets and row ids outside [0, N)", () => {
    expectFormatError(
      mapText({ tiles: ["0", "1"], exits: ["0 north:2", "1"] }),
      "line 11: Exit target 2 outside [0, 2)",
    );
    expectFormatError(mapText({ tiles: ["0", "1"], exits: ["0", "5"] }), "line 12: Tile id 5 outside [0, 2)");
  });

  it("rejects a repeated exit row", () => {
    expectFormatError(
      mapText({ tiles: ["0", "1"], exits: ["1", "1 north:0"] }),
      "line 12: Duplicate exits for tile 1",
    );
  });

  it("needs exactly N exit rows", () => {
    expectFormatError(mapText({ tiles: ["0", "1"], exits: ["0"] }), "line 12: Unexpected end of input");
    expectFormatError(
      mapText({ tiles: ["0"], exits: ["0", "0"] }),
      "line 11: Unexpected content after the exits section",
    );
  });

  it("allows nothing after the exits section, not even a blank line", () => {
    expectFormatError(mapText({ tiles: ["0"], exits: ["0", ""] }));
  });

  it("does not require a final newline", () => {
    const src = mapText({ tiles: ["0"], exits: ["0"] });
    expect(decodeWorldMap(src.slice(0, -1)).getTiles().length).toBe(1);
  });

  it("does not add reverse exits", () => {
    const world = decodeWorldMap(mapText({ tiles: ["0", "1"], exits: ["0 north:1", "1"] }));
    const [t0, t1] = world.getTiles();
    expect(t0?.getExits().get("north")).toBe(t1);
    expect(t1?.getExits().size).toBe(0);
  });
});

describe("decodeWorldMap: geometry", () => {
  it("lays out a tile and its reciprocal exit", () => {
    const world = decodeWorldMap(mapText({ tiles: ["0", "1", "2"], exits: ["0 north:1", "1 south:0", "2"] }));
    const [t0, t1] = world.getTiles();
    expect(world.getTile(new Position(0, 0))).toBe(t0);
    expect(world.getTile(new Position(0, -1))).toBe(t1);
    expect(world.getTiles().length).toBe(2);
  });

  it("rejects a tile reached at two different positions", () => {
    const src = mapText({
      tiles: ["0", "1", "2"],
      exits: ["0 north:1,east:2", "1 east:2", "2"],
    });
    expect(() => decodeWorldMap(src)).toThrow(WorldMapInconsistentError);
  });

  it("rejects two tiles claiming one position", () => {
    const src = mapText({ tiles: ["0", "1", "2"], exits: ["0 north:1", "1 south:2", "2"] });
    expect(() => decodeWorldMap(src)).toThrow(WorldMapInconsistentError);
    expect(() => decodeWorldMap(src)).toThrow("Two tiles claim (0, 0)");
  });

  it("rejects a tile that exits to itself", () => {
    expect(() => decodeWorldMap(mapText({ tiles: ["0"], exits: ["0 west:0"] }))).toThrow(
      WorldMapInconsistentError,
    );
  });

  it("rejects a layout that runs off the 32-bit grid", () => {
    const src = mapText({ start: ["2147483647", "0"], tiles: ["0", "1"], exits: ["0 east:1", "1"] });
    expect(() => decodeWorldMap(src)).toThrow(WorldMapInconsistentError);
  });

  it("tags errors with the phase that produced them", () => {
    try {
      decodeWorldMap(mapText({ tiles: ["0"], exits: ["0 west:0"] }));
      expect.unreachable();
    } catch (e: unknown) {
      expect(e).toBeInstanceOf(WorldMapInconsistentError);
      if (e instanceof WorldMapInconsistentError) expect(e.phase).toBe("consistency");
    }

    try {
      decodeWorldMap("");
      expect.unreachable();
    } catch (e: unknown) {
      expect(e).toBeInstanceOf(WorldMapFormatError);
      if (e instanceof WorldMapFormatError) {
        expect(e.phase).toBe("format");
        expect(e.line).toBe(1);
      }
    }
  });

  it("warns about tiles unreachable from tile 0", () => {
    const warnings: string[] = [];
    const world = decodeWorldMap(
      mapText({ tiles: ["0", "1", "2"], exits: ["0", "1 east:2", "2 west:1"] }),
      (m) => warnings.push(m),
    );
    expect(world.getTiles().length).toBe(1);
    expect(warnings).toEqual(["2 of 3 tiles are unreachable from tile 0 and will not be saved"]);
  });
});
