import fs from 'fs/promises';
import path from 'path';
import mammoth from 'mammoth';
import { ExtractionFailed, errorMessage } from './errors';

const LARGE_FILE_BYTES = 5 * 1024 * 1024; // 5MB

export const SUPPORTED_EXTENSIONS = ['.txt', '.md', '.pdf', '.docx', '.rtf'] as const;

export type SupportedExtension = typeof SUPPORTED_EXTENSIONS[number];

const TYPE_LABELS: Record<SupportedExtension, string> = {
  '.txt': 'Plain Text Document',
  '.md': 'Markdown Document',
  '.pdf': 'PDF Document',
  '.docx': 'Microsoft Word Document',
  '.rtf': 'Rich Text Format Document'
};

export function getFileExtension(fileName: string): string {
  return path.extname(fileName).toLowerCase();
}

export function isSupportedExtension(ext: string): ext is SupportedExtension {
  return SUPPORTED_EXTENSIONS.some(supported => supported === ext);
}

export function describeFileType(ext: string): string {
  return isSupportedExtension(ext) ? TYPE_LABELS[ext] : `${ext.replace('.', '').toUpperCase()} Document`;
}

function warnIfLarge(fileName: string, size: number): void {
  if (size > LARGE_FILE_BYTES) {
    console.warn(`Warning: Large file ${fileName} (${(size / 1024 / 1024).toFixed(2)} MB). Extraction may take time.`);
  }
}

export async function processTextFile(filePath: string, fileName: string): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ExtractionFailed(fileName, errorMessage(error));
  }
}

export async function processPDF(filePath: string, fileName: string): Promise<string> {
  try {
    const dataBuffer = await fs.readFile(filePath);
    warnIfLarge(fileName, dataBuffer.length);

    // Loaded on first use: pdf-parse does work at import time
    const { default: pdf } = await import('pdf-parse');
    const parseStartTime = Date.now();
    const data = await pdf(dataBuffer);
    console.log(`PDF ${fileName} parsed in ${Date.now() - parseStartTime}ms (${data.numpages} page(s))`);

    if (!data.text || data.text.trim().length === 0) {
      throw new Error(
        data.numpages > 0
          ? `PDF appears to be a scanned document (${data.numpages} page(s)) with no extractable text`
          : 'PDF appears to be empty'
      );
    }
    return data.text;
  } catch (error) {
    throw new ExtractionFailed(fileName, errorMessage(error));
  }
}

export async function processDocx(filePath: string, fileName: string): Promise<string> {
  try {
    const dataBuffer = await fs.readFile(filePath);
    warnIfLarge(fileName, dataBuffer.length);

    const result = await mammoth.extractRawText({ buffer: dataBuffer });
    if (result.messages.length > 0) {
      console.warn(`DOCX processing warnings for ${fileName}:`, result.messages);
    }
    if (!result.value || result.value.trim().length === 0) {
      throw new Error('DOCX appears to be empty or contains no extractable text');
    }
    return result.value;
  } catch (error) {
    throw new ExtractionFailed(fileName, errorMessage(error));
  }
}

const RTF_ESCAPES: Record<string, string> = { '{': '\u0001', '}': '\u0002', '\\': '\u0003' };
const RTF_LITERALS: Record<string, string> = { '\u0001': '{', '\u0002': '}', '\u0003': '\\' };

/**
 * Strips RTF control words and groups, keeping the visible text.
 * Escaped braces and backslashes survive as literals.
 */
export function stripRtf(content: string): string {
  return content
    .replace(/\\([{}\\])/g, (_, ch: string) => RTF_ESCAPES[ch])
    .replace(/\{\\\*[^{}]*\}/g, '')
    .replace(/\\par\b ?/g, '\n')
    .replace(/\\'([0-9a-f]{2})/gi, (_, hex: string) => String.fromCharCode(parseInt(hex, 16)))
    .replace(/\\[a-z]+-?\d* ?/gi, '')
    .replace(/[{}]/g, '')
    .replace(/[\u0001-\u0003]/g, ch => RTF_LITERALS[ch])
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0)
    .join('\n');
}

export async function processRtf(filePath: string, fileName: string): Promise<string> {
  try {
    const content = await fs.readFile(filePath, 'utf-8');
    return stripRtf(content);
  } catch (error) {
    throw new ExtractionFailed(fileName, errorMessage(error));
  }
}

export async function extractText(filePath: string, fileName: string): Promise<string> {
  const ext = getFileExtension(fileName);
  switch (ext) {
    case '.txt':
    case '.md':
      return processTextFile(filePath, fileName);
    case '.pdf':
      return processPDF(filePath, fileName);
    case '.docx':
      return processDocx(filePath, fileName);
    case '.rtf':
      return processRtf(filePath, fileName);
    default:
      throw new ExtractionFailed(fileName, `unsupported file type ${ext}`);
  }
}
