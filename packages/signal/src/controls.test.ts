import { describe, expect, it } from 'vitest';
import { applyControl, parseControl } from './controls.js';
import { InvalidInputError } from './errors.js';
import { SignalStore } from './store.js';

function invalidInputFrom(fn: () => unknown): InvalidInputError {
  try {
    fn();
  } catch (err) {
    if (err instanceof InvalidInputError) return err;
    throw err;
  }
  throw new Error('expected InvalidInputError');
}

describe('parseControl', () => {
  it('accepts each command shape', () => {
    expect(parseControl({ action: 'select-letter', letter: 'B' })).toEqual({ action: 'select-letter', letter: 'B' });
    expect(parseControl({ action: 'append-digit', digit: 6 })).toEqual({ action: 'append-digit', digit: 6 });
    expect(parseControl({ action: 'clear' })).toEqual({ action: 'clear' });
  });

  it('reads form-style digit strings as numbers', () => {
    expect(parseControl({ action: 'append-digit', digit: '0' })).toEqual({ action: 'append-digit', digit: 0 });
  });

  it.each([['Q'], ['v'], ['VV'], [''], [3]])('rejects letter %j', (letter) => {
    const err = invalidInputFrom(() => parseControl({ action: 'select-letter', letter }));
    expect(err.field).toBe('letter');
    expect(err.value).toBe(letter);
  });

  it.each([['10'], ['a'], [-1], [10], [2.5], ['']])('rejects digit %j', (digit) => {
    const err = invalidInputFrom(() => parseControl({ action: 'append-digit', digit }));
    expect(err.field).toBe('digit');
    expect(err.value).toBe(digit);
  });

  it('names the action field for unknown commands', () => {
    const err = invalidInputFrom(() => parseControl({ action: 'reset' }));
    expect(err.field).toBe('action');
    expect(err.value).toBe('reset');
  });

  it('names the whole command when the input is not an object', () => {
    const err = invalidInputFrom(() => parseControl('clear'));
    expect(err.field).toBe('command');
    expect(err.value).toBe('clear');
  });
});

describe('applyControl', () => {
  it('runs a select, number, clear sequence against the store', () => {
    const store = new SignalStore();

    expect(applyControl(store, { action: 'select-letter', letter: 'V' }).snapshot).toEqual({ signal: 'V', revision: 1 });
    expect(applyControl(store, { action: 'append-digit', digit: '2' }).snapshot).toEqual({ signal: 'V2', revision: 2 });
    expect(applyControl(store, { action: 'clear' }).snapshot).toEqual({ signal: '-', revision: 3 });
  });

  it('leaves the store untouched on invalid input', () => {
    const store = new SignalStore();
    store.setLetter('C');

    expect(() => applyControl(store, { action: 'select-letter', letter: 'Q' })).toThrow(InvalidInputError);
    expect(store.get()).toEqual({ signal: 'C', revision: 1 });
  });
});
