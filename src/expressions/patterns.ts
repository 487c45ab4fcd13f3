import { InvalidPatternError } from '../errors.js';

export interface CaptureGroup {
  /** 1-based position of the group in the pattern */
  index: number;
  /** Group name, or its index when the group is unnamed */
  name: string;
}

const INLINE_FLAGS = /\(\?([imsxU]+)\)/g;
const SCOPED_FLAGS = /\(\?[imsxU-]+:/g;
const NAMED_GROUP = /^\(\?P?<([A-Za-z_][A-Za-z0-9_]*)>/;

/** Finds syntax RegExp accepts but the engine does not. */
function unsupportedSyntax(pattern: string): string | undefined {
  let inClass = false;
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i];
    if (ch === '\\') {
      const next = pattern[i + 1] ?? '';
      if (/[1-9]/.test(next) || (next === 'k' && pattern[i + 2] === '<')) {
        return 'backreferences are not supported';
      }
      i++;
    } else if (inClass) {
      if (ch === ']') inClass = false;
    } else if (ch === '[') {
      inClass = true;
      if (pattern[i + 1] === '^') i++;
      // a leading ] is a literal member
      if (pattern[i + 1] === ']') i++;
    } else if (ch === '(' && pattern[i + 1] === '?') {
      const head = pattern.slice(i + 2, i + 4);
      if (head.startsWith('=') || head.startsWith('!') || head === '<=' || head === '<!') {
        return 'look-around assertions are not supported';
      }
    }
  }
  return undefined;
}

/**
 * Returns why the engine would reject the pattern, or undefined when it is valid.
 * Engine patterns use a different dialect from RegExp; its inline flag and
 * `(?P<name>…)` forms are rewritten before checking with RegExp.
 */
export function patternProblem(pattern: string): string | undefined {
  const unsupported = unsupportedSyntax(pattern);
  if (unsupported !== undefined) return unsupported;
  const flags = new Set<string>();
  const source = pattern
    .replace(INLINE_FLAGS, (_match, found: string) => {
      for (const flag of found) {
        if (flag === 'i' || flag === 'm' || flag === 's') flags.add(flag);
      }
      return '';
    })
    .replace(SCOPED_FLAGS, '(?:')
    .replace(/\(\?P</g, '(?<');
  const flagString = [...flags].join('');
  try {
    new RegExp(source, flagString);
    return undefined;
  } catch (err) {
    try {
      // \p{…} classes only parse in unicode mode
      new RegExp(source, `${flagString}u`);
      return undefined;
    } catch {
      return err instanceof Error ? err.message : String(err);
    }
  }
}

/** Escapes a string so the engine matches it literally. */
export function literalPattern(text: string): string {
  return text.replace(/[\\.+*?()|[\]{}^$#&~-]/g, '\\$&');
}

export function assertPattern(pattern: string): string {
  const problem = patternProblem(pattern);
  if (problem !== undefined) {
    throw new InvalidPatternError(pattern, problem);
  }
  return pattern;
}

/** Lists the capture groups of a pattern in order of their opening parenthesis. */
export function captureGroups(pattern: string): CaptureGroup[] {
  const groups: CaptureGroup[] = [];
  let inClass = false;
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i];
    if (ch === '\\') {
      i++;
      continue;
    }
    if (inClass) {
      if (ch === ']') inClass = false;
      continue;
    }
    if (ch === '[') {
      inClass = true;
      if (pattern[i + 1] === '^') i++;
      // a leading ] is literal
      if (pattern[i + 1] === ']') i++;
      continue;
    }
    if (ch !== '(') continue;
    if (pattern[i + 1] !== '?') {
      const index = groups.length + 1;
      groups.push({ index, name: String(index) });
      continue;
    }
    const name = NAMED_GROUP.exec(pattern.slice(i))?.[1];
    if (name !== undefined) {
      groups.push({ index: groups.length + 1, name });
    }
  }
  return groups;
}
