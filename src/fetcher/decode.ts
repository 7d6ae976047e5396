import iconv from 'iconv-lite';

const strictUtf8 = new TextDecoder('utf-8', { fatal: true });
const lossyUtf8 = new TextDecoder('utf-8');

const KOREAN_CHARSETS = new Set(['euc-kr', 'cp949', 'ks_c_5601-1987', 'x-windows-949', 'windows-949']);

export function charsetOf(contentType: string | null | undefined): string | undefined {
  const match = contentType?.match(/charset=["']?([\w-]+)/i);
  return match?.[1].toLowerCase();
}

function tryStrictUtf8(buffer: Buffer): string | null {
  try {
    return strictUtf8.decode(buffer);
  } catch {
    return null;
  }
}

/**
 * Decode a response body: strict UTF-8 first, then CP949, then UTF-8 with
 * replacement characters. A declared Korean charset makes CP949 the fallback
 * even when it leaves replacement characters.
 */
export function decodeBody(bytes: Uint8Array, contentType?: string | null): string {
  const buffer = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);

  const utf8 = tryStrictUtf8(buffer);
  if (utf8 !== null) {
    return utf8;
  }

  const declared = charsetOf(contentType);
  const legacy = iconv.decode(buffer, 'cp949');
  if ((declared && KOREAN_CHARSETS.has(declared)) || !legacy.includes('\uFFFD')) {
    return legacy;
  }
  return lossyUtf8.decode(buffer);
}
