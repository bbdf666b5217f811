/** Content digest, comparable with the hash a get operation carries. */
export type FileHash = {
  algorithm: "sha256";
  value: string;
};

export interface FileHasher {
  /** Rejects when the file cannot be read. */
  hashFile(absolutePath: string): Promise<FileHash>;
}
