import { promises as fs } from "fs";
import path from "path";
import type { ComboHash } from "../core/ids.js";

export const LOG_FILE = "sweep_log.jsonl";
export const CONFIG_FILE = "cfg.yaml";
export const OUTPUTS_DIR = "outputs";
export const PARAMS_FILE = "params.json";
export const THUMB_FILE = "thumb.jpg";

const OUTPUT_EXTENSIONS = new Set(["png", "jpg", "jpeg", "webp", "gif"]);

export interface SweepLayout {
  rootDir: string;
  logPath: string;
  configPath: string;
  outputsDir: string;
  comboDir(hash: ComboHash): string;
  outputPath(hash: ComboHash, ext: string): string;
  thumbPath(hash: ComboHash): string;
  paramsPath(hash: ComboHash): string;
}

export function safeJoin(baseDir: string, name: string): string {
  const joined = path.join(baseDir, name);
  const rel = path.relative(baseDir, joined);
  if (rel.startsWith("..") || path.isAbsolute(rel)) {
    throw new Error(`unsafe sweep path: ${name}`);
  }
  return joined;
}

export function sweepLayout(outputDir: string, sweepName: string): SweepLayout {
  const rootDir = safeJoin(path.resolve(outputDir), sweepName);
  const outputsDir = path.join(rootDir, OUTPUTS_DIR);
  const comboDir = (hash: ComboHash) => safeJoin(outputsDir, hash);
  return {
    rootDir,
    logPath: path.join(rootDir, LOG_FILE),
    configPath: path.join(rootDir, CONFIG_FILE),
    outputsDir,
    comboDir,
    outputPath: (hash, ext) => path.join(comboDir(hash), `output.${ext}`),
    thumbPath: (hash) => path.join(comboDir(hash), THUMB_FILE),
    paramsPath: (hash) => path.join(comboDir(hash), PARAMS_FILE)
  };
}

/** Extension of the artifact URL's path when it is a known image type, else png. */
export function outputExtension(reference: string): string {
  let pathname = reference;
  try {
    pathname = new URL(reference).pathname;
  } catch {
    pathname = reference.split(/[?#]/)[0] ?? reference;
  }
  const ext = path.posix.extname(pathname).slice(1).toLowerCase();
  return OUTPUT_EXTENSIONS.has(ext) ? ext : "png";
}

let tmpCounter = 0;

/** Write to a sibling temp file and rename over the target. */
export async function writeFileAtomic(filePath: string, data: string | Buffer): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tmp = `${filePath}.${process.pid}.${++tmpCounter}.tmp`;
  try {
    await fs.writeFile(tmp, data);
    await fs.rename(tmp, filePath);
  } catch (err) {
    await fs.rm(tmp, { force: true });
    throw err;
  }
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return false;
    throw err;
  }
}
