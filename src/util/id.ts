import crypto from 'node:crypto';

/** Stable short id from an arbitrary string. */
export function hashId(prefix: string, value: string): string {
  const h = crypto.createHash('sha1').update(value, 'utf8').digest('hex').slice(0, 12);
  return `${prefix}${h}`;
}

/** SHA-256 of a document's text; identifies one snapshot of it. */
export function computeChecksum(text: string): string {
  return crypto.createHash('sha256').update(text, 'utf8').digest('hex');
}

/** Normalize to posix-style path separators. */
export function toPosixPath(p: string): string {
  return p.replace(/\\/g, '/');
}
