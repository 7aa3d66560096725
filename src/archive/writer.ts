// Запись zip и tar.gz архивов из списка файлов.
import { createWriteStream } from 'node:fs';
import archiver from 'archiver';
import type { Archiver, ArchiverOptions } from 'archiver';
import type { ArchiveFormat } from './formats.js';
import { entryName } from './formats.js';

export interface WriteArchiveOptions {
  format: ArchiveFormat;
  // Файлы в порядке добавления в архив.
  files: string[];
  outputPath: string;
}

export interface ArchiveResult {
  archivePath: string;
  format: ArchiveFormat;
  entries: string[];
  bytesWritten: number;
}

// statConcurrency: 1 — записи попадают в архив в порядке аргументов.
function createArchiver(format: ArchiveFormat): Archiver {
  const options: ArchiverOptions = { statConcurrency: 1 };
  if (format === 'zip') {
    return archiver('zip', options);
  }
  return archiver('tar', { ...options, gzip: true });
}

/**
 * Упаковывает файлы в архив outputPath под их базовыми именами.
 *
 * Промис разрешается только после события close выходного потока,
 * то есть когда все записи сброшены на диск. Любая ошибка (включая
 * warning ENOENT, которым archiver сообщает об отсутствующем файле)
 * прерывает архив и закрывает поток; частично записанный файл остаётся.
 */
export async function writeArchive(options: WriteArchiveOptions): Promise<ArchiveResult> {
  const { format, files, outputPath } = options;
  const entries = files.map(entryName);

  return new Promise<ArchiveResult>((resolve, reject) => {
    const output = createWriteStream(outputPath);
    const archive = createArchiver(format);
    let failed = false;

    const fail = (error: Error): void => {
      if (failed) return;
      failed = true;
      archive.abort();
      output.destroy();
      reject(error);
    };

    output.on('close', () => {
      if (failed) return;
      resolve({
        archivePath: outputPath,
        format,
        entries,
        bytesWritten: archive.pointer(),
      });
    });
    output.on('error', fail);

    archive.on('error', fail);
    archive.on('warning', fail);

    archive.pipe(output);
    for (const file of files) {
      archive.file(file, { name: entryName(file) });
    }
    archive.finalize().catch(fail);
  });
}
