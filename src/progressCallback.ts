/**
 * The callback function that is used to communicate the progress of a file transfer.
 */
export type ProgressCallback = (
  // The total number of chunks to transfer.
  totalChunksCount: number,
  // The amount of chunks that have been transferred.
  currentChunk: number,
  // The path of the file on the board.
  remotePath: string
) => void;
