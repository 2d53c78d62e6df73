import { describe, test, expect } from 'vitest';
import { errors } from 'playwright';
import { mapDriverError, toSelector } from '../PlaywrightPageHandle.js';
import { FatalIOError, OperationTimeoutError, StaleHandleError } from '../../scraper/types/errors.js';

describe('PlaywrightPageHandle', () => {
  describe('toSelector', () => {
    test('prefixes css and xpath engines', () => {
      expect(toSelector({ kind: 'css', selector: 'table tbody tr' })).toBe('css=table tbody tr');
      expect(toSelector({ kind: 'xpath', selector: '//tr' })).toBe('xpath=//tr');
    });

    test('text patterns become case-insensitive text-matches', () => {
      expect(toSelector({ kind: 'text', pattern: '^(show|load) more$', tag: 'button' })).toBe(
        'button:text-matches("^(show|load) more$", "i")'
      );
    });

    test('exact text uses text-is', () => {
      expect(toSelector({ kind: 'text', pattern: 'Next', exact: true })).toBe('*:text-is("Next")');
    });

    test('role names become a regex name filter', () => {
      expect(toSelector({ kind: 'role', role: 'button' })).toBe('role=button');
      expect(toSelector({ kind: 'role', role: 'tab', name: '^Issues$' })).toBe('role=tab[name=/^Issues$/i]');
    });
  });

  describe('mapDriverError', () => {
    test('driver timeouts become OperationTimeoutError', () => {
      const mapped = mapDriverError(new errors.TimeoutError('waiting failed'), 'click', 'pw-1', 5000);
      expect(mapped).toBeInstanceOf(OperationTimeoutError);
      expect(mapped.message).toBe('click timed out after 5000ms');
    });

    test('detached elements become StaleHandleError', () => {
      const mapped = mapDriverError(new Error('Element is not attached to the DOM'), 'innerText', 'pw-7');
      expect(mapped).toBeInstanceOf(StaleHandleError);
      expect(mapped.message).toBe('innerText: element detached');
    });

    test('a closed page becomes FatalIOError', () => {
      const mapped = mapDriverError(
        new Error('Target page, context or browser has been closed'),
        'query'
      );
      expect(mapped).toBeInstanceOf(FatalIOError);
    });

    test('other errors pass through unchanged', () => {
      const original = new Error('selector syntax');
      expect(mapDriverError(original, 'query')).toBe(original);
    });
  });
});
