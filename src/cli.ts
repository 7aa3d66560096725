#!/usr/bin/env node

// Точка входа CLI.
import { basename } from 'node:path';
import { createArchiveCommand } from './commands/archive-cmd.js';

const programName = basename(process.argv[1] ?? 'archive-files');

await createArchiveCommand(programName).parseAsync();
