import fs from "node:fs/promises";
import path from "node:path";

import type { LocalFileSystem } from "../ports/local-file-system";

const WRITE_BITS = 0o222;
const OWNER_WRITE = 0o200;

function isMissing(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR");
}

async function statOrNull(p: string) {
  try {
    return await fs.stat(p);
  } catch (err) {
    if (isMissing(err)) return null;
    throw err;
  }
}

export class NodeLocalFileSystem implements LocalFileSystem {
  async exists(absolutePath: string): Promise<boolean> {
    return (await statOrNull(absolutePath)) !== null;
  }

  async isDirectory(absolutePath: string): Promise<boolean> {
    const st = await statOrNull(absolutePath);
    return st?.isDirectory() ?? false;
  }

  async readFile(absolutePath: string): Promise<Uint8Array | null> {
    const st = await statOrNull(absolutePath);
    if (!st || !st.isFile()) return null;
    return fs.readFile(absolutePath);
  }

  async writeFile(absolutePath: string, data: Uint8Array): Promise<void> {
    await fs.mkdir(path.dirname(absolutePath), { recursive: true });
    await fs.writeFile(absolutePath, data);
  }

  async remove(absolutePath: string): Promise<void> {
    await fs.rm(absolutePath, { recursive: true, force: true });
  }

  async move(fromPath: string, toPath: string): Promise<void> {
    await fs.mkdir(path.dirname(toPath), { recursive: true });
    await fs.rename(fromPath, toPath);
  }

  async mkdirp(absolutePath: string): Promise<void> {
    await fs.mkdir(absolutePath, { recursive: true });
  }

  /** Owner write bit, not access(2): root can write anything. */
  async isWritable(absolutePath: string): Promise<boolean> {
    const st = await statOrNull(absolutePath);
    return st !== null && (st.mode & OWNER_WRITE) !== 0;
  }

  async setReadOnly(absolutePaths: string[], readOnly: boolean): Promise<void> {
    for (const p of absolutePaths) {
      const st = await fs.stat(p);
      // only the permission bits
      const mode = st.mode & 0o777;
      const next = readOnly ? mode & ~WRITE_BITS : mode | OWNER_WRITE;
      if (next !== mode) await fs.chmod(p, next);
    }
  }
}
