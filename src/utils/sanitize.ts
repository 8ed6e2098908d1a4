/**
 * Output sanitisation against markup injection.
 *
 * @module utils/sanitize
 */

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#x27;',
};

const HTML_SPECIAL_CHARS = /[&<>"']/g;

/** Escape the HTML-significant characters of a single string. */
export function escapeHtml(text: string): string {
  return text.replace(HTML_SPECIAL_CHARS, (char) => HTML_ESCAPES[char] ?? char);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Recursively escape every string inside `value`.
 *
 * Walks arrays and plain objects; numbers, booleans, null, dates and
 * other class instances pass through untouched. Object keys are left as
 * they are. The input is never mutated.
 */
export function sanitize<T>(value: T): T;
export function sanitize(value: unknown): unknown {
  if (typeof value === 'string') return escapeHtml(value);

  if (Array.isArray(value)) return value.map((item: unknown) => sanitize(item));

  if (isPlainObject(value)) {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      // Plain assignment would treat an own "__proto__" key as a prototype change.
      Object.defineProperty(result, key, {
        value: sanitize(entry),
        enumerable: true,
        writable: true,
        configurable: true,
      });
    }
    return result;
  }

  return value;
}
