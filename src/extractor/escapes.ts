/**
 * textext stores its LaTeX source with backslash escapes, so `\alpha`
 * arrives as `\\alpha` and line breaks as `\n`. Unknown escape sequences
 * are kept verbatim.
 */

const SIMPLE_ESCAPES: Record<string, string> = {
  '\\': '\\',
  n: '\n',
  t: '\t',
  r: '\r',
  "'": "'",
  '"': '"',
};

const ESCAPE_RE = /\\(x[0-9a-fA-F]{2}|u[0-9a-fA-F]{4}|[\s\S])/g;

export function decodeEscapes(encoded: string): string {
  return encoded.replace(ESCAPE_RE, (sequence: string, body: string) => {
    if (body.length > 1) {
      return String.fromCharCode(parseInt(body.slice(1), 16));
    }
    return SIMPLE_ESCAPES[body] ?? sequence;
  });
}
