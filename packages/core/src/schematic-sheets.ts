/**
 * Sub-sheet references in KiCad schematics
 *
 * A hierarchical sheet appears in the parent schematic as
 * `(sheet ... (property "Sheetname" "power") (property "Sheetfile" "power.kicad_sch") ...)`.
 * Older files spell the properties "Sheet name" and "Sheet file". Only these
 * two properties are read; the rest of the S-expression is skipped.
 */

import { posix } from 'node:path';

export interface SheetReference {
  /** Sheet name shown in the hierarchy */
  name: string;
  /** Sheet file as written, relative to the referencing schematic's directory */
  file: string;
}

const NAME_PROPERTIES = new Set(['Sheetname', 'Sheet name']);
const FILE_PROPERTIES = new Set(['Sheetfile', 'Sheet file']);

const PROPERTY_PATTERN = /\(property\s+"((?:[^"\\]|\\.)*)"\s+"((?:[^"\\]|\\.)*)"/g;

function unescape(value: string): string {
  return value.replace(/\\(.)/g, '$1');
}

/**
 * Index of the parenthesis closing the list opened at `open`, skipping
 * quoted strings; -1 when the list is not closed.
 */
function findClosingParen(source: string, open: number): number {
  let depth = 0;
  let inString = false;
  for (let i = open; i < source.length; i++) {
    const ch = source[i];
    if (inString) {
      if (ch === '\\') {
        i++;
      } else if (ch === '"') {
        inString = false;
      }
    } else if (ch === '"') {
      inString = true;
    } else if (ch === '(') {
      depth++;
    } else if (ch === ')') {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}

function isSheetListAt(source: string, index: number): boolean {
  return source.startsWith('(sheet', index) && /\s/.test(source.charAt(index + 6));
}

function parseSheetBlock(block: string): SheetReference {
  let name: string | undefined;
  let file: string | undefined;
  for (const match of block.matchAll(PROPERTY_PATTERN)) {
    const key = unescape(match[1]);
    if (NAME_PROPERTIES.has(key)) {
      name ??= unescape(match[2]);
    } else if (FILE_PROPERTIES.has(key)) {
      file ??= unescape(match[2]);
    }
  }
  if (file === undefined) {
    throw new SyntaxError(`Sheet without a file property: ${block.slice(0, 80)}`);
  }
  return { name: name ?? posix.basename(file, '.kicad_sch'), file };
}

/**
 * List the sheets a schematic references directly, in file order
 *
 * @throws SyntaxError if the content is not an S-expression schematic or a
 *   sheet list is unterminated
 *
 * @example
 * parseSheetReferences('(kicad_sch (sheet (property "Sheetname" "io") (property "Sheetfile" "io.kicad_sch")))');
 * // => [{ name: 'io', file: 'io.kicad_sch' }]
 */
export function parseSheetReferences(source: string): SheetReference[] {
  const text = source.replace(/^\uFEFF/, '');
  if (!text.trimStart().startsWith('(kicad_sch')) {
    throw new SyntaxError('Not a KiCad S-expression schematic');
  }

  const sheets: SheetReference[] = [];
  let inString = false;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (ch === '\\') {
        i++;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch === '(' && isSheetListAt(text, i)) {
      const end = findClosingParen(text, i);
      if (end < 0) {
        throw new SyntaxError('Unterminated sheet list');
      }
      sheets.push(parseSheetBlock(text.slice(i, end + 1)));
      i = end;
    }
  }
  return sheets;
}

/**
 * Project-relative path of a sheet file referenced from `parentPath`
 *
 * @returns POSIX path, or null when the reference leaves the project directory
 *
 * @example
 * resolveSheetPath('sheets/top.kicad_sch', '../power.kicad_sch'); // 'power.kicad_sch'
 * resolveSheetPath('top.kicad_sch', '../outside.kicad_sch');      // null
 */
export function resolveSheetPath(parentPath: string, sheetFile: string): string | null {
  const file = sheetFile.replace(/\\/g, '/');
  if (posix.isAbsolute(file) || /^[A-Za-z]:\//.test(file)) {
    return null;
  }
  const resolved = posix.normalize(posix.join(posix.dirname(parentPath), file));
  if (resolved === '..' || resolved.startsWith('../')) {
    return null;
  }
  return resolved;
}
