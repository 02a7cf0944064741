const LINE_BREAKS = /[\s\u0000-\u001f\u007f\u0085\u2028\u2029]+/gu;

function utf8Length(codePoint: number): number {
  if (codePoint < 0x80) return 1;
  if (codePoint < 0x800) return 2;
  return codePoint < 0x10000 ? 3 : 4;
}

/**
 * Capture names end up in error messages and log lines: runs of whitespace and control
 * characters become one space, and the result is cut to `maxBytes` of UTF-8 on a code
 * point boundary.
 */
export function formatOneLineUtf8(text: string, maxBytes: number): string {
  if (!Number.isInteger(maxBytes) || maxBytes <= 0) return '';

  let out = '';
  let used = 0;
  for (const ch of text.replace(LINE_BREAKS, ' ').trim()) {
    used += utf8Length(ch.codePointAt(0) ?? 0);
    if (used > maxBytes) break;
    out += ch;
  }
  return out.trimEnd();
}

export function formatOneLineError(err: unknown, maxBytes: number, fallback = 'Error'): string {
  const message = err instanceof Error ? err.message : String(err);
  return formatOneLineUtf8(message, maxBytes) || fallback;
}

export function toHex(bytes: Uint8Array): string {
  let out = '';
  for (const b of bytes) out += b.toString(16).padStart(2, '0');
  return out;
}
