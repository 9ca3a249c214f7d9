/**
 * File Formatter - runs the pipeline over files on disk.
 *
 * Modes:
 * - check: report whether the file would change, write nothing
 * - stdout: return the formatted text, write nothing
 * - default: write a `.bak` copy (unless disabled), then the file
 *
 * A failure in one file is reported in its FileResult; the batch goes on.
 */
import { copyFileSync, readFileSync, writeFileSync } from 'fs';
import type { FileResult } from '@declsort/types';
import type { DeclsortConfig } from '../config/ConfigLoader.js';
import { FileAccessError } from '../errors/DeclsortError.js';
import type { Logger } from '../logging/Logger.js';
import { formatSource } from '../pipeline/FormatPipeline.js';

export interface FormatFileOptions {
  check?: boolean;
  stdout?: boolean;
  /** Overrides `config.backup` */
  backup?: boolean;
}

export const BACKUP_SUFFIX = '.bak';

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class FileFormatter {
  constructor(
    private readonly config: DeclsortConfig,
    private readonly logger: Logger
  ) {}

  formatFile(path: string, options: FormatFileOptions = {}): FileResult {
    try {
      return this.run(path, options);
    } catch (err) {
      if (err instanceof Error) {
        this.logger.debug('File failed', { path, error: err.message });
        return { path, status: 'failed', error: err };
      }
      throw err;
    }
  }

  formatFiles(paths: readonly string[], options: FormatFileOptions = {}): FileResult[] {
    return paths.map((path) => this.formatFile(path, options));
  }

  private run(path: string, options: FormatFileOptions): FileResult {
    let original: string;
    try {
      original = readFileSync(path, 'utf-8');
    } catch (err) {
      throw new FileAccessError(`Cannot read ${path}: ${errorMessage(err)}`, 'ERR_FILE_UNREADABLE', { filePath: path });
    }

    const result = formatSource(original, path, { organize: this.config.organize, logger: this.logger });
    const formatted = this.config.finalNewline && result.output.length > 0 ? `${result.output}\n` : result.output;
    const changed = formatted !== original;
    this.logger.debug('File formatted', { path, changed, ...result.stats });

    if (options.check) {
      return { path, status: changed ? 'needs-formatting' : 'unchanged' };
    }
    if (options.stdout) {
      return { path, status: changed ? 'formatted' : 'unchanged', output: formatted };
    }
    if (!changed) {
      return { path, status: 'unchanged' };
    }

    let backupPath: string | undefined;
    if (options.backup ?? this.config.backup) {
      backupPath = `${path}${BACKUP_SUFFIX}`;
      try {
        copyFileSync(path, backupPath);
      } catch (err) {
        throw new FileAccessError(
          `Cannot write backup ${backupPath}: ${errorMessage(err)}`,
          'ERR_BACKUP_FAILED',
          { filePath: path },
          'Run with --no-backup to skip backups'
        );
      }
    }

    try {
      writeFileSync(path, formatted);
    } catch (err) {
      throw new FileAccessError(`Cannot write ${path}: ${errorMessage(err)}`, 'ERR_FILE_UNWRITABLE', { filePath: path });
    }

    return { path, status: 'formatted', backupPath };
  }
}
