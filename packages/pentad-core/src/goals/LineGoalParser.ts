/**
 * Line-oriented parser for the goal file, used when the YAML parser rejects
 * the document.
 *
 * Accepted subset:
 * - top-level `key: value` scalars
 * - one level of nested `sub: value` maps
 * - `- item` lists at top level or one level under a key
 * - `|` and `>` block scalars (with `-`/`+` chomping) at either level
 * - single or double quoted scalars, blank lines and `#` comments
 *
 * Anything else raises GoalParseError.
 */

import { GoalParseError } from '../shared/utils/errors.js';

type NestedValue = string | string[];
type TopValue = string | string[] | Record<string, NestedValue>;

interface Line {
  number: number;
  indent: number;
  text: string;
  raw: string;
}

interface Section {
  key: string;
  indent?: number;
  value?: string[] | Record<string, NestedValue>;
}

interface PendingList {
  key: string;
  indent: number;
  itemIndent?: number;
}

const KEY_PATTERN = /^([A-Za-z0-9_][\w .-]*?)\s*:(?:\s+(.*))?$/;
const BLOCK_HEADER_PATTERN = /^([|>])([-+]?)\s*(#.*)?$/;

export function parseGoalLines(content: string): Record<string, TopValue> {
  const lines = content.split(/\r?\n/).map((raw, index) => toLine(raw, index + 1));
  const result: Record<string, TopValue> = {};
  let section: Section | null = null;
  let pending: PendingList | null = null;

  let index = 0;
  while (index < lines.length) {
    const line = lines[index];
    index += 1;

    if (line === undefined || line.text === '' || line.text.startsWith('#')) {
      continue;
    }

    if (line.indent === 0 && section !== null && isListItem(line.text)) {
      // Unindented sequence under a key
      const list = ensureList(section, line.number);
      list.push(parseScalar(listItemText(line.text), line.number));
      result[section.key] = list;
      continue;
    }

    if (line.indent === 0) {
      pending = null;
      section = null;
      const { key, value } = splitKey(line);
      if (key in result) {
        throw new GoalParseError(`Duplicate key "${key}"`, line.number);
      }

      if (value === '') {
        result[key] = '';
        section = { key };
      } else if (BLOCK_HEADER_PATTERN.test(value)) {
        const block = readBlockScalar(lines, index, 0, value, line.number);
        result[key] = block.text;
        index = block.next;
      } else {
        result[key] = parseScalar(value, line.number);
      }
      continue;
    }

    if (section === null) {
      throw new GoalParseError('Unexpected indentation', line.number);
    }

    if (section.indent === undefined) {
      section.indent = line.indent;
    }

    if (line.indent > section.indent) {
      if (pending === null || !isListItem(line.text)) {
        throw new GoalParseError('Unexpected indentation', line.number);
      }
      if (pending.itemIndent === undefined) {
        pending.itemIndent = line.indent;
      } else if (pending.itemIndent !== line.indent) {
        throw new GoalParseError('Inconsistent list indentation', line.number);
      }
      const nested = ensureMap(section, line.number);
      const list = nested[pending.key];
      const item = parseScalar(listItemText(line.text), line.number);
      nested[pending.key] = Array.isArray(list) ? [...list, item] : [item];
      result[section.key] = nested;
      continue;
    }

    if (line.indent < section.indent) {
      throw new GoalParseError('Inconsistent indentation', line.number);
    }

    pending = null;

    if (isListItem(line.text)) {
      const list = ensureList(section, line.number);
      list.push(parseScalar(listItemText(line.text), line.number));
      result[section.key] = list;
      continue;
    }

    const nested = ensureMap(section, line.number);
    const { key, value } = splitKey(line);
    if (key in nested) {
      throw new GoalParseError(`Duplicate key "${section.key}.${key}"`, line.number);
    }

    if (value === '') {
      nested[key] = '';
      pending = { key, indent: line.indent };
    } else if (BLOCK_HEADER_PATTERN.test(value)) {
      const block = readBlockScalar(lines, index, line.indent, value, line.number);
      nested[key] = block.text;
      index = block.next;
    } else {
      nested[key] = parseScalar(value, line.number);
    }
    result[section.key] = nested;
  }

  return result;
}

function toLine(raw: string, number: number): Line {
  const leading = /^[ \t]*/.exec(raw)?.[0] ?? '';
  if (leading.includes('\t') && raw.trim() !== '') {
    throw new GoalParseError('Tabs are not allowed for indentation', number);
  }
  return { number, indent: leading.length, text: raw.trim(), raw };
}

function splitKey(line: Line): { key: string; value: string } {
  const match = KEY_PATTERN.exec(line.text);
  const key = match?.[1];
  if (key === undefined) {
    throw new GoalParseError(`Expected "key: value", got "${line.text}"`, line.number);
  }
  return { key, value: match?.[2]?.trim() ?? '' };
}

function isListItem(text: string): boolean {
  return text === '-' || text.startsWith('- ');
}

function listItemText(text: string): string {
  return text.slice(1).trim();
}

function ensureList(section: Section, lineNumber: number): string[] {
  if (section.value === undefined) {
    section.value = [];
  }
  if (!Array.isArray(section.value)) {
    throw new GoalParseError(`"${section.key}" mixes list items and keys`, lineNumber);
  }
  return section.value;
}

function ensureMap(section: Section, lineNumber: number): Record<string, NestedValue> {
  if (section.value === undefined) {
    section.value = {};
  }
  if (Array.isArray(section.value)) {
    throw new GoalParseError(`"${section.key}" mixes list items and keys`, lineNumber);
  }
  return section.value;
}

function parseScalar(raw: string, lineNumber: number): string {
  const text = raw.trim();

  if (text.startsWith('"')) {
    return readQuoted(text, '"', lineNumber);
  }
  if (text.startsWith("'")) {
    return readQuoted(text, "'", lineNumber);
  }
  if (/^[[{&*!|>]/.test(text)) {
    throw new GoalParseError(`Unsupported value "${text}"`, lineNumber);
  }

  const comment = text.search(/\s#/);
  return (comment >= 0 ? text.slice(0, comment) : text).trimEnd();
}

function readQuoted(text: string, quote: '"' | "'", lineNumber: number): string {
  let value = '';
  let position = 1;

  while (position < text.length) {
    const char = text.charAt(position);

    if (quote === '"' && char === '\\') {
      value += unescape(text.charAt(position + 1));
      position += 2;
      continue;
    }

    if (char === quote) {
      if (quote === "'" && text.charAt(position + 1) === "'") {
        value += "'";
        position += 2;
        continue;
      }
      const rest = text.slice(position + 1).trim();
      if (rest !== '' && !rest.startsWith('#')) {
        throw new GoalParseError(`Unexpected text after quoted value: "${rest}"`, lineNumber);
      }
      return value;
    }

    value += char;
    position += 1;
  }

  throw new GoalParseError('Unterminated quoted value', lineNumber);
}

function unescape(char: string): string {
  switch (char) {
    case 'n':
      return '\n';
    case 't':
      return '\t';
    default:
      return char;
  }
}

/**
 * Collect the lines of a block scalar. `start` is the index of the first
 * line after the header; returns the index of the first line not consumed.
 */
function readBlockScalar(
  lines: Line[],
  start: number,
  parentIndent: number,
  header: string,
  headerLine: number
): { text: string; next: number } {
  const match = BLOCK_HEADER_PATTERN.exec(header);
  if (!match) {
    throw new GoalParseError(`Invalid block scalar header "${header}"`, headerLine);
  }
  const style = match[1];
  const chomping = match[2];

  let blockIndent: number | undefined;
  const collected: string[] = [];
  let index = start;

  while (index < lines.length) {
    const line = lines[index];
    if (line === undefined) {
      break;
    }
    if (line.text === '') {
      collected.push('');
      index += 1;
      continue;
    }
    if (line.indent <= parentIndent) {
      break;
    }
    if (blockIndent === undefined) {
      blockIndent = line.indent;
    } else if (line.indent < blockIndent) {
      throw new GoalParseError('Block scalar line is under-indented', line.number);
    }
    collected.push(line.raw.slice(blockIndent).trimEnd());
    index += 1;
  }

  let trailingBlank = 0;
  while (collected.length > 0 && collected[collected.length - 1] === '') {
    collected.pop();
    trailingBlank += 1;
  }

  const body = style === '>' ? fold(collected) : collected.join('\n');
  if (body === '') {
    return { text: '', next: index };
  }

  let text: string;
  if (chomping === '-') {
    text = body;
  } else if (chomping === '+') {
    text = body + '\n' + '\n'.repeat(trailingBlank);
  } else {
    text = body + '\n';
  }
  return { text, next: index };
}

function fold(lines: string[]): string {
  let text = '';
  let previousBlank = true;

  for (const line of lines) {
    if (line === '') {
      text += '\n';
      previousBlank = true;
      continue;
    }
    if (!previousBlank) {
      text += ' ';
    }
    text += line;
    previousBlank = false;
  }

  return text;
}
