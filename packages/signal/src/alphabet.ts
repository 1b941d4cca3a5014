/**
 * The fixed alphabet a signal is built from.
 *
 * A signal is either the clear marker, a bare section letter ("V"),
 * or a section letter followed by a single digit ("V2").
 */
export const SECTION_LETTERS = ['C', 'V', 'B', 'P', 'W', 'E', 'X', 'R'] as const;

export type SectionLetter = (typeof SECTION_LETTERS)[number];

export const DIGITS = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9] as const;

export type Digit = (typeof DIGITS)[number];

export const CLEAR_MARKER = '-';

export type Signal = typeof CLEAR_MARKER | SectionLetter | `${SectionLetter}${Digit}`;

export function isSectionLetter(value: unknown): value is SectionLetter {
  return typeof value === 'string' && (SECTION_LETTERS as readonly string[]).includes(value);
}

export function isDigit(value: unknown): value is Digit {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 9;
}

export function formatSignal(letter: SectionLetter | null, digit: Digit | null): Signal {
  if (letter === null) return CLEAR_MARKER;
  if (digit === null) return letter;
  return `${letter}${digit}`;
}
