export const EMAIL_PLACEHOLDER = '[REDACTED_EMAIL]';
export const PHONE_PLACEHOLDER = '[REDACTED_PHONE]';

export const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;

// Optional country code, optional (area) code, then ddd-dddd with space, dot or dash separators.
export const PHONE_PATTERN = /(\+?\d{1,2}\s?)?(\(?\d{3}\)?[\s.-]?)?\d{3}[\s.-]?\d{4}/g;

const redactOnce = (text: string): string =>
  text.replace(EMAIL_PATTERN, EMAIL_PLACEHOLDER).replace(PHONE_PATTERN, PHONE_PLACEHOLDER);

/**
 * Masks email addresses and phone numbers. Replacing a phone can expose a
 * word boundary that completes an email (`a@b.co5551234`), so passes
 * repeat until the text is stable.
 */
export const redact = (text: string): string => {
  let current = text;
  let previous: string;

  do {
    previous = current;
    current = redactOnce(current);
  } while (current !== previous);

  return current;
};
