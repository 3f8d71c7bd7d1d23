import { TruncationUnit } from '../../config/classification-config.type';

/**
 * Keep the prefix of `text` that fits in `maxLength` units.
 *
 * - `characters`: Unicode code points (a surrogate pair counts once and is
 *   never split)
 * - `bytes`: UTF-8 bytes, cut on a code point boundary
 *
 * Never throws; a non-positive limit yields an empty string.
 */
export function truncateText(
  text: string,
  maxLength: number,
  unit: TruncationUnit = 'characters',
): string {
  if (maxLength <= 0) {
    return '';
  }
  return unit === 'bytes'
    ? truncateUtf8Bytes(text, maxLength)
    : truncateCodePoints(text, maxLength);
}

function truncateCodePoints(text: string, maxCodePoints: number): string {
  // UTF-16 length is an upper bound on the code point count
  if (text.length <= maxCodePoints) {
    return text;
  }

  let index = 0;
  let count = 0;
  while (index < text.length && count < maxCodePoints) {
    const codePoint = text.codePointAt(index) ?? 0;
    index += codePoint > 0xffff ? 2 : 1;
    count++;
  }
  return text.slice(0, index);
}

function truncateUtf8Bytes(text: string, maxBytes: number): string {
  if (Buffer.byteLength(text, 'utf8') <= maxBytes) {
    return text;
  }

  let index = 0;
  let bytes = 0;
  while (index < text.length) {
    const codePoint = text.codePointAt(index) ?? 0;
    const size =
      codePoint <= 0x7f ? 1 : codePoint <= 0x7ff ? 2 : codePoint <= 0xffff ? 3 : 4;
    if (bytes + size > maxBytes) {
      break;
    }
    bytes += size;
    index += codePoint > 0xffff ? 2 : 1;
  }
  return text.slice(0, index);
}
