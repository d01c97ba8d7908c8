const DATA_URL_PATTERN = /^data:[^;,]+;base64,/i;

export function isNonEmptyBase64(input: unknown): input is string {
  return typeof input === 'string' && input.trim().length > 0;
}

/** Decodes a bare base64 string or a data URL into raw image bytes. */
export function decodeBase64Image(input: string): Buffer {
  const payload = input.trim().replace(DATA_URL_PATTERN, '');
  return Buffer.from(payload.replace(/\s+/g, ''), 'base64');
}
