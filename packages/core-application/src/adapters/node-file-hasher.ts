import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import type { FileHash, FileHasher } from "../ports/file-hasher";

export function hashBytes(data: Uint8Array): FileHash {
  return { algorithm: "sha256", value: createHash("sha256").update(data).digest("hex") };
}

export class NodeFileHasher implements FileHasher {
  async hashFile(absolutePath: string): Promise<FileHash> {
    const algo: FileHash["algorithm"] = "sha256";

    return new Promise((resolve, reject) => {
      const hash = createHash(algo);
      const stream = createReadStream(absolutePath);

      stream.on("data", (chunk) => hash.update(chunk));
      stream.on("error", reject);
      stream.on("end", () => {
        resolve({ algorithm: algo, value: hash.digest("hex") });
      });
    });
  }
}
