import { promises as fs } from "fs";
import path from "path";

let tmpCounter = 0;

/**
 * Writes `content` beside `target` and renames it into place, so readers see
 * either the previous file or the complete new one.
 */
export async function writeFileAtomic(target: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(target), { recursive: true });
  tmpCounter += 1;
  const tmp = `${target}.${process.pid}.${tmpCounter}.tmp`;
  try {
    await fs.writeFile(tmp, content, "utf8");
    await fs.rename(tmp, target);
  } catch (err) {
    await fs.rm(tmp, { force: true });
    throw err;
  }
}

/** Reads a UTF-8 file, returning null when it does not exist. */
export async function readFileIfExists(target: string): Promise<string | null> {
  try {
    return await fs.readFile(target, "utf8");
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
