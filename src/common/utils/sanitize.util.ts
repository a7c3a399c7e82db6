import sanitizeHtml = require('sanitize-html');

const STRIP_ALL: sanitizeHtml.IOptions = {
  allowedTags: [],
  allowedAttributes: {},
};

export function cleanString(value: string) {
  const trimmed = value.trim();
  return trimmed ? sanitizeHtml(trimmed, STRIP_ALL) : '';
}

export function deepSanitize(input: unknown): unknown {
  if (Array.isArray(input)) {
    return input.map((item) => deepSanitize(item));
  }
  if (input instanceof Date) {
    return input;
  }
  if (input && typeof input === 'object') {
    return Object.fromEntries(Object.entries(input).map(([key, value]) => [key, deepSanitize(value)]));
  }
  if (typeof input === 'string') {
    return cleanString(input);
  }
  return input;
}
