/**
 * Archive codec exports
 */

export type {
  EntryType,
  EntryVisitor,
  HeaderFields,
  PackEntry,
  ReadArchiveOptions,
  ReadArchiveSummary,
  TarEntry,
} from "./tar";
export {
  BLOCK_SIZE,
  BlockReader,
  encodeHeader,
  encodePaxRecord,
  listArchive,
  packEntries,
  parsePaxRecords,
  readArchive,
} from "./tar";
