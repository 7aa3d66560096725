// Команда упаковки файлов в zip или tar.gz архив.
import { Command } from 'commander';
import { parseFormat, archiveExtension, writeArchive } from '../archive/index.js';

export const VERSION = '0.1.0';

// Коды завершения процесса.
export const EXIT_OK = 0;
export const EXIT_INVALID_FORMAT = 1;
export const EXIT_FAILURE = 2;

// Вывод команды. Вынесен отдельно, чтобы тесты могли его перехватить.
export interface CommandIO {
  log(line: string): void;
  error(line: string): void;
}

export const consoleIO: CommandIO = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

export interface ArchiveCommandOptions {
  programName: string;
  quiet?: boolean;
}

// Форматирование размера файла.
export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

export function usage(programName: string): string {
  return `Usage: ${programName} <zip|tar> <output> <file> [file ...]`;
}

/**
 * Разбирает позиционные аргументы (формат, имя архива, файлы) и пишет архив.
 * Возвращает код завершения процесса.
 *
 * Нехватка аргументов печатает usage и завершается с кодом 0.
 */
export async function runArchive(
  args: string[],
  options: ArchiveCommandOptions,
  io: CommandIO = consoleIO,
): Promise<number> {
  if (args.length < 3) {
    io.log(usage(options.programName));
    return EXIT_OK;
  }

  const [cmd, output, ...files] = args;
  const format = parseFormat(cmd);
  if (!format) {
    io.log(`${cmd} is not a valid format.`);
    return EXIT_INVALID_FORMAT;
  }

  try {
    const outputPath = output + archiveExtension(format);

    const result = await writeArchive({ format, files, outputPath });

    if (!options.quiet) {
      const count = result.entries.length;
      io.log(
        `Created ${result.archivePath} (${count} ${count === 1 ? 'file' : 'files'}, ${formatSize(result.bytesWritten)})`,
      );
    }
    return EXIT_OK;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.error(`Error: ${message}`);
    return EXIT_FAILURE;
  }
}

export function createArchiveCommand(programName: string): Command {
  return new Command(programName)
    .description('Bundle files into a zip or gzip-compressed tar archive')
    .version(VERSION)
    .usage('<zip|tar> <output> <file> [file ...]')
    .argument('[format]', 'Archive format: zip or tar (case-insensitive)')
    .argument('[output]', 'Output path without extension')
    .argument('[files...]', 'Files to add, stored under their base names')
    .option('-q, --quiet', 'Do not print a summary after success')
    // Имена файлов, начинающиеся с '-', остаются позиционными аргументами.
    .allowUnknownOption()
    .action(async (
      format: string | undefined,
      output: string | undefined,
      files: string[],
      options: { quiet?: boolean },
    ) => {
      const args = [format, output, ...files].filter(
        (arg): arg is string => arg !== undefined,
      );
      process.exitCode = await runArchive(args, { programName, ...options });
    });
}
