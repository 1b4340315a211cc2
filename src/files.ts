// --- File System Operations ---

import { constants, type Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import type { Logger } from "./logger.js";

export const INPUT_EXT = ".mp4";

const isInputFile = (filePath: string) => path.extname(filePath).toLowerCase() === INPUT_EXT;

const byName = (a: Dirent, b: Dirent) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0);

/** Regular files, and symlinks that resolve to one */
const isFileEntry = async (entry: Dirent, fullPath: string): Promise<boolean> => {
  if (entry.isFile()) return true;
  if (!entry.isSymbolicLink()) return false;
  try {
    return (await fs.stat(fullPath)).isFile();
  } catch {
    // dangling link
    return false;
  }
};

export const FileService = {
  /**
   * Collects the `.mp4` inputs under a file or directory path.
   * Directories are walked depth-first with each level visited in name order.
   */
  discover: async (target: string, logger: Logger): Promise<string[]> => {
    const stat = await fs.stat(target).catch(() => undefined);

    if (stat?.isFile() && isInputFile(target)) return [target];
    if (stat?.isDirectory()) {
      try {
        return await FileService.walk(target, logger);
      } catch {
        // unreadable root folder, reported below
      }
    }

    logger.warn(`${target} is neither a valid ${INPUT_EXT} file nor a folder.`);
    return [];
  },

  /**
   * Recursively locates all input files in a directory.
   * Throws when `dir` itself cannot be read; unreadable subfolders are logged and skipped.
   */
  walk: async (dir: string, logger: Logger): Promise<string[]> => {
    const entries = await fs.readdir(dir, { withFileTypes: true });

    let results: string[] = [];
    for (const entry of entries.sort(byName)) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        try {
          results = results.concat(await FileService.walk(fullPath, logger));
        } catch (err: unknown) {
          const reason = err instanceof Error ? err.message : String(err);
          logger.warn(`Could not read folder ${fullPath}: ${reason}`);
        }
      } else if (isInputFile(entry.name) && (await isFileEntry(entry, fullPath))) {
        results.push(fullPath);
      }
    }
    return results;
  },

  /** Checks if a file exists on disk */
  exists: async (filePath: string): Promise<boolean> => {
    try {
      await fs.access(filePath, constants.F_OK);
      return true;
    } catch {
      return false;
    }
  },
};
