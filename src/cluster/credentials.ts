import { EngineError } from "../errors.js";

/** Size of the tar header that precedes a single copied file. */
export const ARCHIVE_HEADER_SIZE = 512;

/**
 * Pull the file contents out of a single-entry archive as returned by the
 * engine's copy call: drop the header block and the NUL padding after it.
 */
export function extractArchivedFile(archive: Buffer): Buffer {
  if (archive.length <= ARCHIVE_HEADER_SIZE) {
    throw new EngineError("extract file", `archive too short (${archive.length} bytes) to contain a file`);
  }
  let end = archive.length;
  while (end > ARCHIVE_HEADER_SIZE && archive[end - 1] === 0) end--;
  return archive.subarray(ARCHIVE_HEADER_SIZE, end);
}
