/**
 * Local disk as seen by the engine. Implementations only carry out the
 * instruction they are given.
 */
export interface LocalFileSystem {
  exists(absolutePath: string): Promise<boolean>;
  isDirectory(absolutePath: string): Promise<boolean>;
  /** null when the file does not exist. */
  readFile(absolutePath: string): Promise<Uint8Array | null>;
  writeFile(absolutePath: string, data: Uint8Array): Promise<void>;
  remove(absolutePath: string): Promise<void>;
  move(fromPath: string, toPath: string): Promise<void>;
  mkdirp(absolutePath: string): Promise<void>;
  isWritable(absolutePath: string): Promise<boolean>;
  setReadOnly(absolutePaths: string[], readOnly: boolean): Promise<void>;
}
