// src/world/transformTool.ts
import path from "node:path";
import { copyFile, mkdir } from "node:fs/promises";

import type { LogFn } from "./actions.js";
import {
  ensureParentDir,
  existsPath,
  formatForPath,
  inferFormatForDirFile,
  isDirectory,
  listFiles,
  readWorldDoc,
  writeWorldDoc,
} from "./worldFiles.js";
import { type WorldTransformKind, transformWorldMap } from "./worldTransform.js";

export type TransformToolOptions = Readonly<{
  out?: string;
  inPlace?: boolean;
  recursive?: boolean;
  overwrite?: boolean;
  dryRun?: boolean;
  includeJson?: boolean;
  backup?: boolean; // only meaningful with inPlace
  log?: LogFn;
  warn?: LogFn;
}>;

export type TransformSummary = Readonly<{
  processed: number;
  written: number;
  skipped: number;
}>;

export function parseTransformKind(op: string): WorldTransformKind {
  const s = op.trim().toLowerCase().replace(/_/g, "-");

  if (s === "rot90" || s === "rotate90" || s === "rotate-90" || s === "r90") return "ROTATE_90";
  if (s === "rot180" || s === "rotate180" || s === "rotate-180" || s === "r180") return "ROTATE_180";
  if (s === "rot270" || s === "rotate270" || s === "rotate-270" || s === "r270") return "ROTATE_270";

  if (s === "flip-h" || s === "fliph" || s === "flip-horizontal" || s === "mirror-h") return "FLIP_H";
  if (s === "flip-v" || s === "flipv" || s === "flip-vertical" || s === "mirror-v") return "FLIP_V";

  if (s === "flip-nwse" || s === "flip-diag-nwse" || s === "diag-nwse") return "FLIP_DIAG_NWSE";
  if (s === "flip-nesw" || s === "flip-diag-nesw" || s === "diag-nesw") return "FLIP_DIAG_NESW";

  throw new Error(
    `Unknown transform '${op}'. Expected: rot90|rot180|rot270|flip-h|flip-v|flip-nwse|flip-nesw`,
  );
}

function opSuffix(op: string): string {
  return op.toLowerCase().replace(/[^a-z0-9]+/g, "-");
}

function defaultOutFileForFile(inputFile: string, op: string): string {
  const ext = path.extname(inputFile);
  const base = inputFile.slice(0, inputFile.length - ext.length);
  return `${base}.${opSuffix(op)}${ext}`;
}

function defaultOutDirForDir(inputDir: string, op: string): string {
  return `${inputDir}__${opSuffix(op)}`;
}

async function backupOnce(file: string, overwrite: boolean): Promise<void> {
  const bak = `${file}.bak`;
  if (!overwrite && (await existsPath(bak))) {
    throw new Error(`Backup exists (use --overwrite or delete): ${bak}`);
  }
  await copyFile(file, bak);
}

export async function runTransformTool(
  opRaw: string,
  inputPath: string,
  opts: TransformToolOptions,
): Promise<TransformSummary> {
  const op = parseTransformKind(opRaw);

  const inPlace = opts.inPlace === true;
  const recursive = opts.recursive === true;
  const overwrite = opts.overwrite === true;
  const dryRun = opts.dryRun === true;
  const includeJson = opts.includeJson === true;
  const backup = opts.backup === true;
  const log = opts.log ?? ((m: string) => console.log(m));
  const warn = opts.warn ?? ((m: string) => console.warn(m));

  let processed = 0;
  let written = 0;
  let skipped = 0;

  if (!(await isDirectory(inputPath))) {
    let outPath: string;
    if (inPlace) {
      outPath = inputPath;
    } else if (opts.out) {
      const outIsDir = !path.extname(opts.out);
      outPath = outIsDir ? path.join(opts.out, path.basename(inputPath)) : opts.out;
    } else {
      outPath = defaultOutFileForFile(inputPath, opRaw);
    }

    if (!inPlace && !overwrite && (await existsPath(outPath))) {
      warn(`Skip (exists): ${outPath}`);
      return { processed: 1, written: 0, skipped: 1 };
    }

    const world = transformWorldMap(await readWorldDoc(inputPath, warn), op);
    processed++;

    if (dryRun) {
      log(`[dry-run] ${inputPath} -> ${outPath}`);
      return { processed, written: 0, skipped: 0 };
    }

    if (inPlace && backup) await backupOnce(inputPath, overwrite);

    await ensureParentDir(outPath);
    await writeWorldDoc(world, outPath, formatForPath(inputPath));
    written++;

    log(`${inputPath} -> ${outPath}`);
    return { processed, written, skipped };
  }

  // Directory mode
  const outDir = inPlace ? null : (opts.out ?? defaultOutDirForDir(inputPath, opRaw));
  const outDirAbs = outDir ? path.resolve(outDir) : null;
  const inDirAbs = path.resolve(inputPath);

  if (outDir && !dryRun) await mkdir(outDir, { recursive: true });

  for (const f of await listFiles(inputPath, recursive)) {
    const fmt = inferFormatForDirFile(f, includeJson);
    if (!fmt) continue;

    // An output dir nested in the input dir must not be fed back in.
    if (outDirAbs && path.resolve(f).startsWith(outDirAbs + path.sep)) continue;

    processed++;

    const rel = path.relative(inDirAbs, path.resolve(f));
    const dest = outDir ? path.join(outDir, rel) : f;

    if (!inPlace && !overwrite && (await existsPath(dest))) {
      skipped++;
      continue;
    }

    if (dryRun) {
      log(`[dry-run] ${f} -> ${dest}`);
      continue;
    }

    const world = transformWorldMap(await readWorldDoc(f, (m) => warn(`${f}: ${m}`)), op);

    if (inPlace && backup) await backupOnce(f, overwrite);

    await ensureParentDir(dest);
    await writeWorldDoc(world, dest, fmt);
    written++;
  }

  log(
    `Done. processed=${processed} written=${written} skipped=${skipped}` +
      (outDir ? ` out=${outDir}` : " (in-place)"),
  );

  return { processed, written, skipped };
}
