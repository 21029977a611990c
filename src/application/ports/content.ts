/**
 * Content-addressed media storage. Files only become visible under
 * `pathFor(checksum)` once `commit` has verified their digest.
 */
export interface MediaStore {
  has(checksum: string): Promise<boolean>;
  verify(checksum: string): Promise<boolean>;
  stagingPath(checksum: string): string;
  commit(checksum: string, stagingPath: string): Promise<boolean>;
  discard(stagingPath: string): Promise<void>;
  pathFor(checksum: string): string;
  list(): Promise<string[]>;
  remove(checksum: string): Promise<void>;
}

export interface MediaDownloader {
  download(url: string, destinationPath: string): Promise<void>;
}
