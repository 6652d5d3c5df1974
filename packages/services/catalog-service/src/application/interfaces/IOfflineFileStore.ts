export interface IOfflineFileStore {
  /** Writes the file under the offline directory and returns its absolute path */
  write(fileName: string, data: Buffer): Promise<string>;
  /** Resolves without error when the file does not exist */
  remove(filePath: string): Promise<void>;
  pathFor(fileName: string): string;
  removeAll(): Promise<void>;
}
