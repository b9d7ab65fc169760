// Property-based tests for PII redaction

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';

import { EMAIL_PATTERN, PHONE_PATTERN, redact } from './redact';

const email = new RegExp(EMAIL_PATTERN.source);
const phone = new RegExp(PHONE_PATTERN.source);

const FRAGMENTS = [
  'a', 'jo', '@', '.', 'com', 'io', '555', '1234', '12', '-', ' ', '(', ')', '+', '+1', 'x', '\n', '_',
];

describe('redact properties', () => {
  it('never leaves an email or phone match behind', () => {
    const text = fc.oneof(
      fc.string(),
      fc.array(fc.constantFrom(...FRAGMENTS), { maxLength: 40 }).map((parts) => parts.join('')),
    );

    fc.assert(
      fc.property(text, (input) => {
        const output = redact(input);
        expect(email.test(output)).toBe(false);
        expect(phone.test(output)).toBe(false);
        expect(redact(output)).toBe(output);
      }),
    );
  });
});
