// Поддерживаемые форматы архивов и их расширения.
import { basename } from 'node:path';

export const ARCHIVE_FORMATS = ['zip', 'tar'] as const;

export type ArchiveFormat = (typeof ARCHIVE_FORMATS)[number];

const EXTENSIONS: Record<ArchiveFormat, string> = {
  zip: '.zip',
  tar: '.tar.gz',
};

function isArchiveFormat(value: string): value is ArchiveFormat {
  return ARCHIVE_FORMATS.some((format) => format === value);
}

// Регистронезависимый разбор имени формата. null — формат не поддерживается.
export function parseFormat(value: string): ArchiveFormat | null {
  const normalized = value.toLowerCase();
  return isArchiveFormat(normalized) ? normalized : null;
}

export function archiveExtension(format: ArchiveFormat): string {
  return EXTENSIONS[format];
}

// Имя записи в архиве: только последний компонент пути, без директорий.
export function entryName(filePath: string): string {
  return basename(filePath);
}
