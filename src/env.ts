import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { parse } from "dotenv";

const projectRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");

export const defaultEnvFiles = (cwd = process.cwd()) => [
  ...new Set([path.join(projectRoot, ".env"), path.resolve(cwd, ".env")]),
];

/**
 * Applies every existing file in order. Variables already present in `target`
 * win, so the real environment beats .env and earlier files beat later ones.
 * Returns the files that were read.
 */
export function loadEnvFiles(files: string[], target: NodeJS.ProcessEnv = process.env): string[] {
  return files.filter((envPath) => {
    if (!fs.existsSync(envPath)) return false;
    Object.entries(parse(fs.readFileSync(envPath))).forEach(([key, value]) => {
      if (target[key] === undefined) {
        target[key] = value;
      }
    });
    return true;
  });
}

loadEnvFiles(defaultEnvFiles());
