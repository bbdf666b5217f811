import path from "node:path";

import type { LocalFileSystem } from "../ports/local-file-system";
import type { FileHash, FileHasher } from "../ports/file-hasher";
import { hashBytes } from "../adapters/node-file-hasher";

type Entry = { kind: "file"; data: Uint8Array; readOnly: boolean } | { kind: "dir" };

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function bytes(text: string): Uint8Array {
  return encoder.encode(text);
}

export function sha256(text: string): string {
  return hashBytes(bytes(text)).value;
}

/**
 * In-memory disk for tests. Every mutation is appended to `mutations`,
 * so a test can assert that a run changed nothing.
 */
export class MemoryFileSystem implements LocalFileSystem, FileHasher {
  readonly entries = new Map<string, Entry>();
  readonly mutations: string[] = [];

  addFile(p: string, content: string, options: { readOnly?: boolean } = {}): this {
    this.ensureDirs(path.dirname(p));
    this.entries.set(p, { kind: "file", data: bytes(content), readOnly: options.readOnly ?? true });
    return this;
  }

  addDir(p: string): this {
    this.ensureDirs(p);
    return this;
  }

  text(p: string): string | null {
    const e = this.entries.get(p);
    return e?.kind === "file" ? decoder.decode(e.data) : null;
  }

  isReadOnly(p: string): boolean {
    const e = this.entries.get(p);
    return e?.kind === "file" && e.readOnly;
  }

  private ensureDirs(dir: string) {
    for (let d = dir; ; d = path.dirname(d)) {
      if (!this.entries.has(d)) this.entries.set(d, { kind: "dir" });
      if (path.dirname(d) === d) break;
    }
  }

  private childrenOf(p: string): string[] {
    const prefix = p.endsWith("/") ? p : `${p}/`;
    return [...this.entries.keys()].filter((k) => k.startsWith(prefix));
  }

  async exists(p: string): Promise<boolean> {
    return this.entries.has(p);
  }

  async isDirectory(p: string): Promise<boolean> {
    return this.entries.get(p)?.kind === "dir";
  }

  async readFile(p: string): Promise<Uint8Array | null> {
    const e = this.entries.get(p);
    return e?.kind === "file" ? e.data.slice() : null;
  }

  async writeFile(p: string, data: Uint8Array): Promise<void> {
    const e = this.entries.get(p);
    if (e?.kind === "file" && e.readOnly) throw new Error(`EACCES: permission denied, open '${p}'`);
    if (e?.kind === "dir") throw new Error(`EISDIR: illegal operation on a directory, open '${p}'`);
    this.ensureDirs(path.dirname(p));
    this.entries.set(p, { kind: "file", data: data.slice(), readOnly: false });
    this.mutations.push(`write ${p}`);
  }

  async remove(p: string): Promise<void> {
    if (!this.entries.has(p)) return;
    for (const child of this.childrenOf(p)) this.entries.delete(child);
    this.entries.delete(p);
    this.mutations.push(`remove ${p}`);
  }

  async move(from: string, to: string): Promise<void> {
    const e = this.entries.get(from);
    if (!e) throw new Error(`ENOENT: no such file or directory, rename '${from}'`);
    this.ensureDirs(path.dirname(to));
    for (const child of this.childrenOf(from)) {
      const moved = this.entries.get(child);
      this.entries.delete(child);
      if (moved) this.entries.set(to + child.slice(from.length), moved);
    }
    this.entries.delete(from);
    this.entries.set(to, e);
    this.mutations.push(`move ${from} -> ${to}`);
  }

  async mkdirp(p: string): Promise<void> {
    if (this.entries.get(p)?.kind === "dir") return;
    this.ensureDirs(p);
    this.mutations.push(`mkdir ${p}`);
  }

  async isWritable(p: string): Promise<boolean> {
    const e = this.entries.get(p);
    if (!e) return false;
    return e.kind === "dir" || !e.readOnly;
  }

  async setReadOnly(paths: string[], readOnly: boolean): Promise<void> {
    for (const p of paths) {
      const e = this.entries.get(p);
      if (!e) throw new Error(`ENOENT: no such file or directory, chmod '${p}'`);
      if (e.kind === "file" && e.readOnly !== readOnly) {
        e.readOnly = readOnly;
        this.mutations.push(`chmod ${readOnly ? "ro" : "rw"} ${p}`);
      }
    }
  }

  async hashFile(p: string): Promise<FileHash> {
    const e = this.entries.get(p);
    if (e?.kind !== "file") throw new Error(`ENOENT: no such file or directory, open '${p}'`);
    return hashBytes(e.data);
  }
}
