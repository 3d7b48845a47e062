/**
 * A file on the board as reported by `file.list()`.
 *
 * The flash filesystem is flat, the path is the full name of the file.
 */
export default interface FileData {
  path: string;
  /**
   * The size of the file in bytes
   */
  size: number;
}
