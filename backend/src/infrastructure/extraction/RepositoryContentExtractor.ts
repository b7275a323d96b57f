import { Logger } from '@nestjs/common';
import { open, readdir, readFile, stat } from 'fs/promises';
import { extname, join, relative, sep } from 'path';
import { ExtractedContent, IContentExtractor } from '../../domain/ports/IContentExtractor';
import { ExtractionError } from '../../domain/errors';
import rules from './extraction-rules.json';

export interface ExtractorOptions {
  maxSourceFiles?: number;
  maxChars?: number;
}

export const DEFAULT_MAX_SOURCE_FILES = 150;
export const DEFAULT_MAX_EXTRACTED_CHARS = 400000;
export const TRUNCATION_MARKER = '\n\n[... content truncated ...]';

interface ExtractedFile {
  path: string;
  content: string;
}

const lowercase = (values: string[]): Set<string> => new Set(values.map((value) => value.toLowerCase()));

const TEXT_EXTENSIONS = lowercase(rules.textExtensions);
const CODE_EXTENSIONS = lowercase(rules.codeExtensions);
const CODE_FILE_NAMES = lowercase(rules.codeFileNames);
const IMPORTANT_FILES = lowercase(rules.importantFiles);
const IGNORE_DIRS = lowercase(rules.ignoreDirs);
const IGNORE_FILES = lowercase(rules.ignoreFiles);
const IGNORE_EXTENSIONS = rules.ignoreExtensions.map((ext) => ext.toLowerCase());

/**
 * Walks a checked-out repository and renders the files worth summarizing as
 * one text document: important files (README, manifests, licences) first,
 * then source files, within a file count and character budget.
 */
export class RepositoryContentExtractor implements IContentExtractor {
  private readonly logger = new Logger(RepositoryContentExtractor.name);
  private readonly maxSourceFiles: number;
  private readonly maxChars: number;

  constructor(options: ExtractorOptions = {}) {
    this.maxSourceFiles = options.maxSourceFiles ?? DEFAULT_MAX_SOURCE_FILES;
    this.maxChars = options.maxChars ?? DEFAULT_MAX_EXTRACTED_CHARS;
  }

  async extract(repositoryPath: string): Promise<ExtractedContent> {
    const important: ExtractedFile[] = [];
    const sources: ExtractedFile[] = [];

    for (const filePath of await this.walk(repositoryPath)) {
      const name = filePath.split(sep).pop() || filePath;
      const lowerName = name.toLowerCase();
      const isImportant = IMPORTANT_FILES.has(lowerName);
      const isCode = CODE_EXTENSIONS.has(extname(lowerName)) || CODE_FILE_NAMES.has(lowerName);

      if (!isImportant && (!isCode || sources.length >= this.maxSourceFiles)) {
        continue;
      }

      const content = await this.readCandidate(join(repositoryPath, filePath), lowerName);
      if (content === null) {
        continue;
      }

      const entry = { path: filePath.split(sep).join('/'), content };
      if (isImportant) {
        important.push(entry);
      } else {
        sources.push(entry);
      }
    }

    if (important.length === 0 && sources.length === 0) {
      throw new ExtractionError('No readable content found in repository');
    }

    const { text, truncated } = this.render(important, sources);
    this.logger.debug(
      `Extracted ${important.length} important and ${sources.length} source files (${text.length} chars${truncated ? ', truncated' : ''})`,
    );

    return {
      text,
      importantFiles: important.length,
      sourceFiles: sources.length,
      truncated,
    };
  }

  /**
   * Relative paths of every file outside ignored directories, in a stable order
   */
  private async walk(root: string, dir: string = root): Promise<string[]> {
    const entries = await readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => a.name.localeCompare(b.name));

    const files: string[] = [];
    for (const entry of entries) {
      const lowerName = entry.name.toLowerCase();
      const fullPath = join(dir, entry.name);

      if (entry.isDirectory()) {
        if (IGNORE_DIRS.has(lowerName) || entry.name.startsWith('.')) {
          continue;
        }
        files.push(...(await this.walk(root, fullPath)));
      } else if (entry.isFile()) {
        if (IGNORE_FILES.has(lowerName)) {
          continue;
        }
        // Dotfiles are noise unless they are well-known project files
        if (entry.name.startsWith('.') && !IMPORTANT_FILES.has(lowerName)) {
          continue;
        }
        if (IGNORE_EXTENSIONS.some((ext) => lowerName.endsWith(ext))) {
          continue;
        }
        files.push(relative(root, fullPath));
      }
    }
    return files;
  }

  private async readCandidate(fullPath: string, lowerName: string): Promise<string | null> {
    const { size } = await stat(fullPath);
    if (size > rules.maxFileSizeBytes || size < rules.minFileSizeBytes) {
      return null;
    }

    const ext = extname(lowerName);
    const knownText = TEXT_EXTENSIONS.has(ext) || CODE_EXTENSIONS.has(ext);
    if (!knownText && (await this.isLikelyBinary(fullPath))) {
      return null;
    }

    const content = await readFile(fullPath, 'utf-8');
    return content.trim() === '' ? null : content;
  }

  private async isLikelyBinary(fullPath: string): Promise<boolean> {
    const handle = await open(fullPath, 'r');
    try {
      const buffer = Buffer.alloc(rules.binarySniffBytes);
      const { bytesRead } = await handle.read(buffer, 0, buffer.length, 0);
      return buffer.subarray(0, bytesRead).includes(0);
    } finally {
      await handle.close();
    }
  }

  private render(important: ExtractedFile[], sources: ExtractedFile[]): { text: string; truncated: boolean } {
    const sections = [
      ...important.map((file) => `=== ${file.path} ===\n${file.content.trimEnd()}`),
      ...sources.map((file) => `--- ${file.path} ---\n${file.content.trimEnd()}`),
    ];
    const text = sections.join('\n\n');

    if (text.length <= this.maxChars) {
      return { text, truncated: false };
    }
    return { text: text.slice(0, this.maxChars) + TRUNCATION_MARKER, truncated: true };
  }
}
