import { Dirent, Stats } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { DocumentInfo, LoadedDocument } from '../types';
import { describeFileType, extractText, getFileExtension, isSupportedExtension } from './documentProcessor';
import { NotFound, errorMessage } from './errors';
import { highlight, toDisplayName } from './textUtils';

interface DocumentFile {
  name: string;
  fileName: string;
  path: string;
  extension: string;
  size: number;
  modified: Date;
}

export interface DocumentView extends DocumentInfo {
  content: string;
  html: string;
  highlight: string | null;
}

export function toDocumentName(fileName: string): string {
  return path.parse(fileName).name.replace(/[ -]/g, '_');
}

function formatModified(date: Date): string {
  return date.toISOString().slice(0, 16).replace('T', ' ');
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function statIfPresent(filePath: string): Promise<Stats | null> {
  try {
    return await fs.stat(filePath);
  } catch (error) {
    if (isMissing(error)) {
      return null;
    }
    throw error;
  }
}

/**
 * Read-only view of the documents directory. Nothing is cached: every call
 * goes back to the filesystem, so edits show up on the next request.
 */
export class DocumentStore {
  constructor(private readonly directory: string) {}

  get root(): string {
    return this.directory;
  }

  async list(): Promise<DocumentInfo[]> {
    const files = await this.scan();
    return files.map(file => ({
      name: file.name,
      displayName: toDisplayName(file.name),
      fileName: file.fileName,
      type: describeFileType(file.extension),
      sizeKb: Math.round((file.size / 1024) * 100) / 100,
      modified: formatModified(file.modified)
    }));
  }

  async load(name: string): Promise<string> {
    const file = await this.find(name);
    return extractText(file.path, file.fileName);
  }

  /** Loads every listed document, skipping (with a warning) those that fail to extract. */
  async loadAll(): Promise<LoadedDocument[]> {
    const files = await this.scan();
    const documents: LoadedDocument[] = [];
    for (const file of files) {
      try {
        const rawText = await extractText(file.path, file.fileName);
        documents.push({
          name: file.name,
          fileName: file.fileName,
          path: file.path,
          extension: file.extension,
          rawText,
          byteSize: file.size,
          modified: formatModified(file.modified)
        });
      } catch (error) {
        console.warn(`[documents] Skipping ${file.fileName}: ${errorMessage(error)}`);
      }
    }
    return documents;
  }

  async describe(name: string, highlightTerm?: string): Promise<DocumentView> {
    const file = await this.find(name);
    const content = await extractText(file.path, file.fileName);
    const term = highlightTerm?.trim() || null;
    return {
      name: file.name,
      displayName: toDisplayName(file.name),
      fileName: file.fileName,
      type: describeFileType(file.extension),
      sizeKb: Math.round((file.size / 1024) * 100) / 100,
      modified: formatModified(file.modified),
      content,
      html: highlight(content, term ?? undefined).replace(/\n/g, '<br>'),
      highlight: term
    };
  }

  private async find(name: string): Promise<DocumentFile> {
    const files = await this.scan();
    const file = files.find(f => f.name === name);
    if (!file) {
      throw new NotFound(`Document "${name}"`);
    }
    return file;
  }

  // Enumeration order is whatever the filesystem returns
  private async scan(): Promise<DocumentFile[]> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(this.directory, { withFileTypes: true });
    } catch (error) {
      if (isMissing(error)) {
        await fs.mkdir(this.directory, { recursive: true });
        console.log(`[documents] Created documents directory ${this.directory}`);
        return [];
      }
      throw error;
    }

    const files: DocumentFile[] = [];
    const claimed = new Map<string, string>();
    for (const entry of entries) {
      if (!entry.isFile()) continue;
      const extension = getFileExtension(entry.name);
      if (!isSupportedExtension(extension)) continue;

      const name = toDocumentName(entry.name);
      const owner = claimed.get(name);
      if (owner) {
        console.warn(`[documents] Ignoring ${entry.name}: document name "${name}" is already used by ${owner}`);
        continue;
      }

      const filePath = path.join(this.directory, entry.name);
      const stats = await statIfPresent(filePath);
      if (!stats) {
        console.warn(`[documents] Skipping ${entry.name}: removed while listing`);
        continue;
      }
      claimed.set(name, entry.name);
      files.push({
        name,
        fileName: entry.name,
        path: filePath,
        extension,
        size: stats.size,
        modified: stats.mtime
      });
    }
    return files;
  }
}
