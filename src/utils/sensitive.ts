/**
 * Wrapper for values that must not be printed or serialized by accident.
 *
 * String conversion, JSON serialization and util.inspect (console.log) all
 * render as "(sensitive)". Call reveal() at the single point where the raw
 * value is actually needed.
 */

import { inspect } from 'node:util';
import { maskValue } from './logger.js';

export const REDACTED = '(sensitive)';

export class Sensitive<T> {
  private readonly value: T;

  constructor(value: T) {
    this.value = value;
    if (typeof value === 'string') {
      maskValue(value);
    }
  }

  reveal(): T {
    return this.value;
  }

  toString(): string {
    return REDACTED;
  }

  toJSON(): string {
    return REDACTED;
  }

  [inspect.custom](): string {
    return REDACTED;
  }
}
