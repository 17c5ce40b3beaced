/**
 * Byte storage used to persist documentation sets
 * Paths are relative to the store's root and use forward slashes
 */
export interface Store {
  /**
   * Read a file as UTF-8 text
   * @throws FileSystemError when the file is missing or unreadable
   */
  read(path: string): Promise<string>;

  /**
   * Write a file, creating parent directories and replacing any previous content
   */
  write(path: string, content: string): Promise<void>;

  exists(path: string): Promise<boolean>;

  /**
   * Size of a file in bytes
   */
  size(path: string): Promise<number>;

  /**
   * Names of the entries of a directory; empty when it does not exist
   */
  list(path?: string): Promise<string[]>;

  /**
   * Remove a file or directory tree; missing paths are ignored
   */
  delete(path: string): Promise<void>;
}
