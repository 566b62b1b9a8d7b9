import * as fs from 'node:fs';
import * as path from 'node:path';
import type { DocumentMetadata, VectorStore } from '../ports/VectorStore';
import { ValidationError } from './errors';
import { logger as defaultLogger } from './logger';
import type { Logger } from './logger';

export interface IngestOptions {
  /** File extensions to pick up, matched case-insensitively. */
  extensions?: string[];
  /** Pack paragraphs into chunks of about this many characters; whole files when unset. */
  chunkSize?: number;
}

export interface IngestSummary {
  files: number;
  documents: number;
}

export class IngestHandler {
  constructor(private readonly vectorStore: VectorStore, private readonly logger: Logger = defaultLogger) {}

  private isDirectory(pathName: string): boolean {
    try {
      const stats = fs.statSync(pathName);
      return stats.isDirectory();
    } catch (error) {
      return false
    }
  }

  private matchesExtension(filePath: string, extensions: string[]): boolean {
    const extension = path.extname(filePath).toLowerCase();
    return extensions.some((candidate) => normalizeExtension(candidate) === extension);
  }

  private getAllFiles(dirPath: string, extensions: string[]): string[] {
    const files: string[] = [];

    const processDirectory = (currentPath: string) => {
      const items = fs.readdirSync(currentPath).sort();

      for (const item of items) {
        const fullPath = path.join(currentPath, item);
        const stats = fs.statSync(fullPath);

        if (stats.isDirectory()) {
          processDirectory(fullPath);
        } else if (this.matchesExtension(fullPath, extensions)) {
          files.push(fullPath);
        }
      }
    };

    processDirectory(dirPath);
    return files;
  }

  // Ids are paths relative to the ingest root, with / separators
  private toDocuments(
    root: string,
    filePath: string,
    content: string,
    chunkSize?: number
  ): { id: string; text: string; metadata: DocumentMetadata }[] {
    const filename = path.basename(filePath);
    const id = path.relative(root, filePath).split(path.sep).join('/');
    const metadata: DocumentMetadata = { filename, source: filePath, type: 'text_file' };

    if (!chunkSize) {
      return [{ id, text: content, metadata }];
    }

    const chunks = chunkByParagraphs(content, {
      chunkSize,
      overlap: Math.floor(chunkSize * 0.1) // 10% overlap
    });

    return chunks.map((chunk, index) => ({
      id: `${id}#${index}`,
      text: chunk,
      metadata: { ...metadata, chunk_index: index }
    }));
  }

  public async run(pathName: string, options: IngestOptions = {}): Promise<IngestSummary> {
    const extensions = options.extensions ?? ['.txt'];
    if (options.chunkSize !== undefined && (!Number.isInteger(options.chunkSize) || options.chunkSize <= 0)) {
      throw new ValidationError(`chunkSize must be a positive integer, got ${options.chunkSize}`);
    }

    const normalizedPath = path.normalize(pathName.trim());
    if (!fs.existsSync(normalizedPath)) {
      throw new ValidationError(`Path does not exist: ${normalizedPath}`);
    }

    let filesToProcess: string[];
    let root: string;

    if (this.isDirectory(normalizedPath)) {
      root = normalizedPath;
      this.logger.info(`📁 Processing directory: ${normalizedPath}`);
      filesToProcess = this.getAllFiles(normalizedPath, extensions);

      if (filesToProcess.length === 0) {
        throw new ValidationError(`No files matching ${extensions.join(', ')} found in ${normalizedPath}`);
      }
    } else {
      if (!this.matchesExtension(normalizedPath, extensions)) {
        throw new ValidationError(`File does not match ${extensions.join(', ')}: ${normalizedPath}`);
      }
      filesToProcess = [normalizedPath];
      root = path.dirname(normalizedPath);
    }

    const documents: string[] = [];
    const ids: string[] = [];
    const metadatas: DocumentMetadata[] = [];
    let files = 0;

    for (const filePath of filesToProcess) {
      const content = fs.readFileSync(filePath, 'utf-8');
      if (!content.trim()) {
        this.logger.warning(`⚠️  Skipping empty file: ${path.basename(filePath)}`);
        continue;
      }

      for (const document of this.toDocuments(root, filePath, content, options.chunkSize)) {
        documents.push(document.text);
        ids.push(document.id);
        metadatas.push(document.metadata);
      }
      files++;
    }

    if (documents.length === 0) {
      this.logger.warning(`No content to load from ${normalizedPath}`);
      return { files: 0, documents: 0 };
    }

    await this.vectorStore.addDocuments(documents, ids, metadatas);
    this.logger.success(`🎉 Loaded ${documents.length} documents from ${files} files in ${normalizedPath}`);
    return { files, documents: documents.length };
  }
}

function normalizeExtension(extension: string): string {
  const trimmed = extension.trim().toLowerCase();
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}

/**
 * Packs blank-line separated paragraphs into chunks of at most `chunkSize`
 * characters (a single longer paragraph becomes its own chunk). Consecutive
 * chunks share roughly `overlap / chunkSize` of their paragraphs.
 */
export function chunkByParagraphs(content: string, options: { chunkSize: number, overlap: number }): string[] {
  const paragraphs = content.split(/\n\s*\n/).filter(p => p.trim())
  const chunks: string[] = []

  let i = 0
  while (i < paragraphs.length) {
    let currentChunk = ''
    let paragraphsInChunk = 0

    while (i + paragraphsInChunk < paragraphs.length) {
      const testChunk = currentChunk +
        (currentChunk ? '\n\n' : '') +
        paragraphs[i + paragraphsInChunk]

      if (testChunk.length > options.chunkSize && currentChunk) break

      currentChunk = testChunk
      paragraphsInChunk++
    }

    chunks.push(currentChunk.trim())
    if (i + paragraphsInChunk >= paragraphs.length) break

    const overlapParagraphs = Math.ceil(paragraphsInChunk * (options.overlap / options.chunkSize))
    i += Math.max(1, paragraphsInChunk - overlapParagraphs)
  }

  return chunks
}
