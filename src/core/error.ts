/**
 * @file error.ts
 * @description Error classes for the text and buffer boundaries of the library.
 *
 * The numeric routines themselves never throw.
 */

export class LowlevelError extends Error {
  explain: string;
  constructor(message: string) {
    super(message);
    this.name = 'LowlevelError';
    this.explain = message;
  }
}

/** A string could not be read as a half-precision literal */
export class HalfParseError extends LowlevelError {
  readonly text: string;
  constructor(text: string) {
    super('Unable to parse half-precision value: ' + JSON.stringify(text));
    this.name = 'HalfParseError';
    this.text = text;
  }
}
