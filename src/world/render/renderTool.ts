// src/world/render/renderTool.ts
import path from "node:path";
import { mkdir, writeFile } from "node:fs/promises";

import type { LogFn } from "../actions.js";
import {
  ensureParentDir,
  existsPath,
  inferFormatForDirFile,
  isDirectory,
  listFiles,
  readWorldDoc,
} from "../worldFiles.js";
import { renderWorldMapToPng } from "./worldRenderer.js";

export type RenderToolOptions = Readonly<{
  cellSize?: number;
  out?: string;
  recursive?: boolean;
  overwrite?: boolean;
  dryRun?: boolean;
  includeJson?: boolean;
  log?: LogFn;
  warn?: LogFn;
}>;

function defaultOutFile(inputFile: string): string {
  const ext = path.extname(inputFile);
  const base = inputFile.slice(0, inputFile.length - ext.length);
  return `${base}.png`;
}

function defaultOutDirForDir(inputDir: string): string {
  return `${inputDir}__png`;
}

export async function runRenderTool(inputPath: string, opts: RenderToolOptions): Promise<void> {
  const recursive = opts.recursive === true;
  const overwrite = opts.overwrite === true;
  const dryRun = opts.dryRun === true;
  const includeJson = opts.includeJson === true;
  const log = opts.log ?? ((m: string) => console.log(m));
  const warn = opts.warn ?? ((m: string) => console.warn(m));
  const renderOpts = opts.cellSize === undefined ? {} : { cellSize: opts.cellSize };

  if (!(await isDirectory(inputPath))) {
    const outPath = opts.out ?? defaultOutFile(inputPath);

    if (!overwrite && (await existsPath(outPath))) {
      warn(`Skip (exists): ${outPath}`);
      return;
    }

    if (dryRun) {
      log(`[dry-run] ${inputPath} -> ${outPath}`);
      return;
    }

    const png = renderWorldMapToPng(await readWorldDoc(inputPath, warn), renderOpts);
    await ensureParentDir(outPath);
    await writeFile(outPath, png);
    log(`${inputPath} -> ${outPath}`);
    return;
  }

  const outDir = opts.out ?? defaultOutDirForDir(inputPath);
  if (!dryRun) await mkdir(outDir, { recursive: true });

  const inDirAbs = path.resolve(inputPath);
  const outDirAbs = path.resolve(outDir);

  for (const f of await listFiles(inputPath, recursive)) {
    if (!inferFormatForDirFile(f, includeJson)) continue;

    // Avoid reprocessing output dir if nested
    if (path.resolve(f).startsWith(outDirAbs + path.sep)) continue;

    const rel = path.relative(inDirAbs, path.resolve(f));
    const dest = path.join(outDir, rel).replace(/\.(world|json)$/i, ".png");

    if (!overwrite && (await existsPath(dest))) continue;

    if (dryRun) {
      log(`[dry-run] ${f} -> ${dest}`);
      continue;
    }

    const png = renderWorldMapToPng(await readWorldDoc(f, (m) => warn(`${f}: ${m}`)), renderOpts);
    await ensureParentDir(dest);
    await writeFile(dest, png);
  }

  log(`Done. out=${outDir}`);
}
