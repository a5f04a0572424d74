import fs from "node:fs/promises";
import { logger } from "../config/logger.js";

const EXECUTE_BITS = 0o111;

export interface PermissionFixer {
  /** Resolves to true when the mode was changed. */
  makeExecutable(filePath: string): Promise<boolean>;
}

/** Adds the execute bits to a file when any are missing. Safe to call repeatedly. */
export async function makeExecutable(filePath: string): Promise<boolean> {
  const stats = await fs.stat(filePath);
  const mode = stats.mode & 0o777;
  if ((mode & EXECUTE_BITS) === EXECUTE_BITS) return false;

  await fs.chmod(filePath, mode | EXECUTE_BITS);
  logger.info({ filePath, mode: (mode | EXECUTE_BITS).toString(8) }, "Made plugin executable");
  return true;
}

export async function canExecute(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export const chmodPermissionFixer: PermissionFixer = { makeExecutable };
