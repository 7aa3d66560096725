// Barrel-файл модуля архивов.
export type { ArchiveFormat } from './formats.js';
export { ARCHIVE_FORMATS, parseFormat, archiveExtension, entryName } from './formats.js';

export type { WriteArchiveOptions, ArchiveResult } from './writer.js';
export { writeArchive } from './writer.js';
