import { z } from 'zod';
import { SECTION_LETTERS, isDigit, type Digit, type SectionLetter } from './alphabet.js';
import { InvalidInputError } from './errors.js';
import type { MutationResult, SignalStore } from './store.js';

/**
 * Control inputs arrive from forms and JSON bodies, so digits may come in as
 * "7" or 7. Both parse to the same Digit.
 */
export const sectionLetterSchema = z.enum(SECTION_LETTERS);

export const digitSchema = z
  .union([z.string().regex(/^[0-9]$/).transform((s) => Number(s)), z.number()])
  .refine((value): value is Digit => isDigit(value), { message: 'Expected a digit 0-9' });

export const controlCommandSchema = z.discriminatedUnion('action', [
  z.object({ action: z.literal('select-letter'), letter: sectionLetterSchema }),
  z.object({ action: z.literal('append-digit'), digit: digitSchema }),
  z.object({ action: z.literal('clear') }),
]);

export type ControlCommand =
  | { action: 'select-letter'; letter: SectionLetter }
  | { action: 'append-digit'; digit: Digit }
  | { action: 'clear' };

function valueAt(input: unknown, path: ReadonlyArray<string | number>): unknown {
  let current: unknown = input;
  for (const key of path) {
    if (typeof current !== 'object' || current === null) return undefined;
    current = Reflect.get(current, key);
  }
  return current;
}

/**
 * Validate an untrusted control input.
 * @throws InvalidInputError naming the first offending field
 */
export function parseControl(input: unknown): ControlCommand {
  const result = controlCommandSchema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  const path = issue?.path ?? [];
  const field = path.length > 0 ? path.join('.') : 'command';
  throw new InvalidInputError(field, valueAt(input, path), issue?.message);
}

/** Validate `input` and apply it to `store`. Invalid input leaves the store as it was. */
export function applyControl(store: SignalStore, input: unknown): MutationResult {
  const command = parseControl(input);
  switch (command.action) {
    case 'select-letter':
      return store.setLetter(command.letter);
    case 'append-digit':
      return store.appendDigit(command.digit);
    case 'clear':
      return store.clear();
  }
}
