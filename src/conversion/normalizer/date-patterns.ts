import { MappingError } from '../interfaces/conversion-error';

/**
 * strptime-style date patterns.
 *
 * Mapping declarations carry patterns such as `%d/%m/%Y`. A pattern compiles
 * into an anchored, case-insensitive RegExp plus the list of captured
 * directives. A directive outside the supported set is a mapping error.
 *
 * Supported: %Y (4-digit year), %y (2-digit year, 69-99 -> 19xx),
 * %m, %d, %H, %M, %S (1-2 digits), %b / %B (English month abbreviations /
 * names), %f (1-6 digit fraction of a second) and %% (literal percent).
 * Whitespace in a pattern matches any run of whitespace.
 */
export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

type Directive = 'Y' | 'y' | 'm' | 'd' | 'H' | 'M' | 'S' | 'b' | 'B' | 'f';

interface CompiledPattern {
  regex: RegExp;
  directives: Directive[];
}

const MONTH_NAMES = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
];

const MONTH_ABBREVIATIONS = MONTH_NAMES.map((name) => name.slice(0, 3));

const DIRECTIVE_SOURCES: Record<Directive, string> = {
  Y: '(\\d{4})',
  y: '(\\d{2})',
  m: '(\\d{1,2})',
  d: '(\\d{1,2})',
  H: '(\\d{1,2})',
  M: '(\\d{1,2})',
  S: '(\\d{1,2})',
  b: `(${MONTH_ABBREVIATIONS.join('|')})`,
  B: `(${MONTH_NAMES.join('|')})`,
  f: '(\\d{1,6})',
};

const isDirective = (char: string): char is Directive =>
  Object.prototype.hasOwnProperty.call(DIRECTIVE_SOURCES, char);

/** Retried in order after the declared pattern fails. */
export const FALLBACK_DATE_PATTERNS: readonly string[] = [
  '%Y-%m-%d',
  '%d/%m/%Y',
  '%d-%m-%Y',
];

function escapeLiteral(char: string): string {
  if (/\s/.test(char)) return '\\s+';
  return char.replace(/[.*+?^${}()|[\]\\/-]/g, '\\$&');
}

/**
 * Compile a pattern.
 *
 * @throws MappingError (invalid, date_format) for an unsupported or
 *   incomplete directive
 */
export function compileDatePattern(pattern: string): CompiledPattern {
  let source = '^';
  const directives: Directive[] = [];

  for (let i = 0; i < pattern.length; i++) {
    const char = pattern[i];
    if (char !== '%') {
      // collapse whitespace runs so "%d  %m" behaves like "%d %m"
      if (/\s/.test(char) && i > 0 && /\s/.test(pattern[i - 1])) continue;
      source += escapeLiteral(char);
      continue;
    }

    const next = pattern[i + 1];
    i++;
    if (next === '%') {
      source += '%';
    } else if (next !== undefined && isDirective(next)) {
      source += DIRECTIVE_SOURCES[next];
      directives.push(next);
    } else {
      throw new MappingError(
        'invalid',
        'date_format',
        next === undefined
          ? `Incomplete directive at the end of date format "${pattern}"`
          : `Unsupported directive %${next} in date format "${pattern}"`,
      );
    }
  }

  return { regex: new RegExp(`${source}$`, 'i'), directives };
}

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/**
 * Parse `text` with `pattern`. The whole text must match and the result
 * must be a real calendar date with in-range time fields.
 *
 * @throws MappingError when the pattern itself is unusable
 */
export function parseDate(text: string, pattern: string): CalendarDate | null {
  const compiledPattern = compileDatePattern(pattern);

  const match = compiledPattern.regex.exec(text);
  if (!match) return null;

  let year = 1900;
  let month = 1;
  let day = 1;

  for (let i = 0; i < compiledPattern.directives.length; i++) {
    const captured = match[i + 1];
    const value = Number.parseInt(captured, 10);
    switch (compiledPattern.directives[i]) {
      case 'Y':
        year = value;
        break;
      case 'y':
        year = value < 69 ? 2000 + value : 1900 + value;
        break;
      case 'm':
        month = value;
        break;
      case 'd':
        day = value;
        break;
      case 'H':
        if (value > 23) return null;
        break;
      case 'M':
      case 'S':
        if (value > 59) return null;
        break;
      case 'b':
        month = MONTH_ABBREVIATIONS.indexOf(captured.toLowerCase()) + 1;
        break;
      case 'B':
        month = MONTH_NAMES.indexOf(captured.toLowerCase()) + 1;
        break;
      case 'f':
        break;
    }
  }

  if (year < 1 || month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;

  return { year, month, day };
}

export function formatIsoDate(date: CalendarDate): string {
  const year = String(date.year).padStart(4, '0');
  const month = String(date.month).padStart(2, '0');
  const day = String(date.day).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Try the declared pattern, then each fallback pattern not already tried.
 * Returns the ISO date and the pattern that matched, or null.
 */
export function parseWithFallback(
  text: string,
  declaredPattern: string,
): { iso: string; pattern: string } | null {
  const candidates = [declaredPattern, ...FALLBACK_DATE_PATTERNS].filter(
    (pattern, index, all) => all.indexOf(pattern) === index,
  );

  for (const pattern of candidates) {
    const parsed = parseDate(text, pattern);
    if (parsed) {
      return { iso: formatIsoDate(parsed), pattern };
    }
  }
  return null;
}
