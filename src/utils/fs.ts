import { promises as fs, constants as fsConstants, Dirent } from 'fs';
import { join, dirname } from 'path';
import { parse as parseJsonc, ParseError, printParseErrorCode } from 'jsonc-parser';
import { logger } from './logger.js';
import { FileSystemError } from './errors.js';
import { isJunk } from 'junk';

/**
 * File system utilities with proper error handling
 */

/**
 * Check if a file or directory exists
 */
export async function exists(path: string): Promise<boolean> {
  try {
    await fs.access(path, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a path is a directory
 */
export async function isDirectory(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Check if a path is a file
 */
export async function isFile(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isFile();
  } catch {
    return false;
  }
}

/**
 * Recursively create directories
 */
export async function ensureDir(path: string): Promise<void> {
  try {
    await fs.mkdir(path, { recursive: true });
    logger.debug(`Directory located or created: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to locate or create directory: ${path}`, { path, error });
  }
}

/**
 * Read a file as text
 */
export async function readTextFile(path: string, encoding: BufferEncoding = 'utf8'): Promise<string> {
  try {
    return await fs.readFile(path, encoding);
  } catch (error) {
    throw new FileSystemError(`Failed to read file: ${path}`, { path, error });
  }
}

/**
 * Write text to a file
 */
export async function writeTextFile(path: string, content: string, encoding: BufferEncoding = 'utf8'): Promise<void> {
  try {
    await ensureDir(dirname(path));
    await fs.writeFile(path, content, encoding);
    logger.debug(`Wrote file: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to write file: ${path}`, { path, error });
  }
}

async function readEntries(dirPath: string): Promise<Dirent[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries
      .filter(entry => !isJunk(entry.name))
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  } catch (error) {
    throw new FileSystemError(`Failed to read directory: ${dirPath}`, { dirPath, error });
  }
}

/**
 * List entry names in a directory (non-recursive, sorted, junk excluded)
 */
export async function listEntries(dirPath: string): Promise<string[]> {
  const entries = await readEntries(dirPath);
  return entries.map(entry => entry.name);
}

/**
 * List directories in a directory (non-recursive, sorted)
 */
export async function listDirectories(dirPath: string): Promise<string[]> {
  const entries = await readEntries(dirPath);
  return entries.filter(entry => entry.isDirectory()).map(entry => entry.name);
}

/**
 * Recursively walk through a directory and yield every file, in sorted order
 * at each level so repeated walks see the same sequence.
 */
export async function* walkFiles(dirPath: string): AsyncGenerator<string> {
  const entries = await readEntries(dirPath);

  for (const entry of entries) {
    const fullPath = join(dirPath, entry.name);
    if (entry.isFile()) {
      yield fullPath;
    } else if (entry.isDirectory()) {
      yield* walkFiles(fullPath);
    }
  }
}

/**
 * Recursively yield every directory below `dirPath` whose name equals `name`.
 * Matching directories are not descended into.
 */
export async function* findDirectoriesNamed(dirPath: string, name: string): AsyncGenerator<string> {
  let entries: Dirent[];
  try {
    entries = await readEntries(dirPath);
  } catch (error) {
    // Unreadable subtrees (permissions, dangling links) are skipped, not fatal
    logger.debug(`Skipping unreadable directory: ${dirPath}`, { error });
    return;
  }

  for (const entry of entries) {
    if (!entry.isDirectory()) {
      continue;
    }
    const fullPath = join(dirPath, entry.name);
    if (entry.name === name) {
      yield fullPath;
    } else {
      yield* findDirectoriesNamed(fullPath, name);
    }
  }
}

/**
 * Write object to a JSONC-compatible file
 */
export async function writeJsoncFile(path: string, data: unknown, indent: number = 2): Promise<void> {
  try {
    const content = JSON.stringify(data, null, indent);
    await writeTextFile(path, content + '\n');
  } catch (error) {
    if (error instanceof FileSystemError) {
      throw error;
    }
    throw new FileSystemError(`Failed to write JSONC file: ${path}`, { path, error });
  }
}

/**
 * Read a JSON or JSONC file (auto-detect format) and parse it
 */
export async function readJsonOrJsoncFile(path: string): Promise<unknown> {
  const content = await readTextFile(path);
  const errors: ParseError[] = [];
  const result: unknown = parseJsonc(content, errors, { allowTrailingComma: true });
  if (errors.length > 0 || result === undefined) {
    const reasons = errors.map(err => `${printParseErrorCode(err.error)} at offset ${err.offset}`);
    throw new FileSystemError(`Failed to parse JSON/JSONC file: ${path}`, { path, reasons });
  }
  return result;
}
