// src/program.ts
import { Command, InvalidArgumentError } from "commander";

import { errorMessage } from "./world/errors.js";
import { runRenderTool } from "./world/render/renderTool.js";
import { ExitCode, STDIN_SENTINEL, readStream, runActionsTool } from "./world/runTool.js";
import { runTransformTool } from "./world/transformTool.js";
import { readWorldDoc, readWorldJson, writeWorldJson } from "./world/worldFiles.js";
import { loadWorldMap, saveWorldMap } from "./world/worldMapFile.js";
import { stringifyWorldJsonV1, worldMapToJsonV1 } from "./world/worldJsonV1.js";

function parseCellSize(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 4) throw new InvalidArgumentError("Expected an integer >= 4.");
  return n;
}

/**
 * Builds the command-line program. `configure` runs before any command is
 * added, so settings it makes (exit override, output streams) reach every
 * subcommand.
 */
export function buildProgram(configure: (program: Command) => void = () => {}): Command {
  const program = new Command();
  configure(program);

  program
    .name("blockworld")
    .description("Block world map tools (run actions, check, JSON, transforms, renderer)")
    .version("0.1.0");

  program
    .command("run", { isDefault: true })
    .description(
      "Load a map, apply actions, save the result. Exit codes: 1 usage, 2 load, 3 action source, 4 actions, 5 save. " +
        "An input map named like a command (check, render, ...) needs the explicit 'run' form.",
    )
    .argument("<inputMap>", "Path to the world map to load")
    .argument("<actions>", `Path to an actions file, or '${STDIN_SENTINEL}' for standard input`)
    .argument("<outputMap>", "Path to write the resulting map to")
    .allowExcessArguments(false)
    .action(async (inputMap: string, actions: string, outputMap: string) => {
      process.exitCode = await runActionsTool(inputMap, actions, outputMap, {
        log: (m) => console.log(m),
        warn: (m) => console.warn(m),
        error: (m) => process.stderr.write(m + "\n"),
        readStdin: () => readStream(process.stdin),
      });
    });

  program
    .command("check")
    .description("Load each map and report its reachable tiles, or why it is rejected")
    .argument("<inputs...>", "Paths to .world or .json maps")
    .action(async (inputs: string[]) => {
      let failed = 0;
      for (const input of inputs) {
        try {
          const world = await readWorldDoc(input, (m) => console.warn(`${input}: ${m}`));
          console.log(`${input}: ok (${world.getTiles().length} tiles)`);
        } catch (e: unknown) {
          failed++;
          console.log(`${input}: ${errorMessage(e)}`);
        }
      }
      if (failed > 0) process.exitCode = ExitCode.LOAD_FAILED;
    });

  program
    .command("to-json")
    .description("Convert a .world map to its JSON view")
    .argument("<input>", "Path to .world file")
    .option("-o, --output <path>", "Write JSON to a file (default: stdout)")
    .action(async (input: string, opts: { output?: string }) => {
      const world = await loadWorldMap(input, (m) => console.warn(m));
      if (opts.output) await writeWorldJson(world, opts.output);
      else process.stdout.write(stringifyWorldJsonV1(worldMapToJsonV1(world)));
    });

  program
    .command("from-json")
    .description("Convert a JSON view back to a .world map")
    .argument("<input>", "Path to JSON file")
    .requiredOption("-o, --output <path>", "Write .world to this path")
    .action(async (input: string, opts: { output: string }) => {
      const world = await readWorldJson(input);
      await saveWorldMap(world, opts.output);
    });

  program
    .command("transform")
    .description(
      "Rotate or mirror a map or folder of maps about the origin. Default is to write copies; use --in-place to overwrite.",
    )
    .argument("op", "rot90|rot180|rot270|flip-h|flip-v|flip-nwse|flip-nesw")
    .argument("input", "Path to .world/.json OR a directory containing .world files")
    .option("-o, --out <path>", "Output file (single input) or output dir (directory input)")
    .option("--in-place", "Overwrite inputs in place (use with care)", false)
    .option("--recursive", "Recurse into subdirectories (directory input)", false)
    .option("--include-json", "When input is a directory, include .json files too", false)
    .option("--overwrite", "Allow overwriting existing outputs (non in-place)", false)
    .option("--backup", "When --in-place, write a .bak copy before overwriting", false)
    .option("--dry-run", "Print planned operations but do not write anything", false)
    .action(
      async (
        op: string,
        input: string,
        opts: {
          out?: string;
          inPlace: boolean;
          recursive: boolean;
          includeJson: boolean;
          overwrite: boolean;
          backup: boolean;
          dryRun: boolean;
        },
      ) => {
        await runTransformTool(op, input, opts);
      },
    );

  program
    .command("render")
    .description("Render a map or folder of maps to top-down PNGs")
    .argument("input", "Path to .world/.json OR directory")
    .option("--cell-size <px>", "Pixels per tile", parseCellSize, 16)
    .option("-o, --out <path>", "Output file (single input) or output dir (directory input)")
    .option("--recursive", "Recurse into subdirectories (directory input)", false)
    .option("--include-json", "When input is a directory, include .json files too", false)
    .option("--overwrite", "Overwrite existing PNGs", false)
    .option("--dry-run", "Print planned operations but do not write anything", false)
    .action(
      async (
        input: string,
        opts: {
          cellSize: number;
          out?: string;
          recursive: boolean;
          includeJson: boolean;
          overwrite: boolean;
          dryRun: boolean;
        },
      ) => {
        await runRenderTool(input, opts);
      },
    );

  return program;
}
