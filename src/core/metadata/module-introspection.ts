import { dirname, join } from 'path';
import type { PackageDirectory } from '../../types/index.js';
import { FILE_PATTERNS } from '../../constants/index.js';
import { exists, isFile, readTextFile } from '../../utils/fs.js';

const DOCSTRING_START = /^[rRuU]?("""|'''|"|')/;

/**
 * Strip leading and trailing blank lines and the indentation shared by every
 * line after the first.
 */
export function cleanDocstring(raw: string): string {
  const lines = raw.replace(/\t/g, '        ').split('\n');
  const rest = lines.slice(1).filter(line => line.trim() !== '');
  const indent = rest.length === 0
    ? 0
    : Math.min(...rest.map(line => line.length - line.trimStart().length));

  const cleaned = [lines[0].trim(), ...lines.slice(1).map(line => line.slice(indent).trimEnd())];
  while (cleaned.length > 0 && cleaned[0] === '') {
    cleaned.shift();
  }
  while (cleaned.length > 0 && cleaned[cleaned.length - 1] === '') {
    cleaned.pop();
  }
  return cleaned.join('\n');
}

/**
 * The module docstring: the string literal that opens the source, after any
 * blank lines, comments and encoding declarations. Null when the first
 * statement is anything else.
 */
export function extractDocstring(source: string): string | null {
  const lines = source.replace(/^\uFEFF/, '').split(/\r?\n/);
  let index = 0;
  while (index < lines.length && (lines[index].trim() === '' || lines[index].trimStart().startsWith('#'))) {
    index++;
  }
  if (index >= lines.length) {
    return null;
  }

  const body = lines.slice(index).join('\n').trimStart();
  const opening = DOCSTRING_START.exec(body);
  if (!opening) {
    return null;
  }

  const quote = opening[1];
  const contentStart = opening[0].length;
  if (quote.length === 3) {
    const end = body.indexOf(quote, contentStart);
    return end === -1 ? null : cleanDocstring(body.slice(contentStart, end));
  }

  const lineEnd = body.indexOf('\n');
  const firstLine = lineEnd === -1 ? body : body.slice(0, lineEnd);
  const end = firstLine.indexOf(quote, contentStart);
  return end === -1 ? null : firstLine.slice(contentStart, end);
}

async function readTopLevelName(descriptorDir: string): Promise<string | null> {
  const topLevelPath = join(descriptorDir, FILE_PATTERNS.TOP_LEVEL);
  if (!(await exists(topLevelPath))) {
    return null;
  }
  const first = (await readTextFile(topLevelPath)).split(/\r?\n/).find(line => line.trim() !== '');
  return first ? first.trim() : null;
}

/**
 * Source file of the importable module behind an installed package: the
 * package's own name, then the first name listed in its `top_level.txt`,
 * each tried as `<name>/__init__.py` and `<name>.py` beside the descriptor.
 */
export async function locateModuleSource(directory: PackageDirectory): Promise<string | null> {
  if (directory.kind === 'module') {
    return directory.path;
  }

  const siteDir = dirname(directory.path);
  const names = [directory.name, directory.name.replace(/[-.]/g, '_')];
  const topLevel = await readTopLevelName(directory.path);
  if (topLevel) {
    names.push(topLevel);
  }

  for (const name of new Set(names)) {
    const candidates = [
      join(siteDir, name, FILE_PATTERNS.INIT_MODULE),
      join(siteDir, `${name}${FILE_PATTERNS.MODULE_SUFFIX}`)
    ];
    for (const candidate of candidates) {
      if (await isFile(candidate)) {
        return candidate;
      }
    }
  }
  return null;
}
