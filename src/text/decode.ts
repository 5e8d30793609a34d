const BASE64_BODY = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Decode a standard Base64 payload into UTF-8 text.
 *
 * Validation is strict: whitespace (including line breaks) is removed, and any
 * other character outside `A-Z a-z 0-9 + /` and trailing `=` padding rejects the
 * whole payload. URL-safe `-`/`_` and missing padding are rejected too, unlike
 * `Buffer.from(s, "base64")`, which skips such characters silently.
 * A rejected payload, or one that is not valid UTF-8, yields "".
 */
export function decodeBase64Text(encoded: unknown): string {
  if (typeof encoded !== "string") return "";

  const compact = encoded.replace(/\s+/g, "");
  if (!compact || compact.length % 4 !== 0 || !BASE64_BODY.test(compact)) return "";

  const bytes = Buffer.from(compact, "base64");
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch {
    // invalid UTF-8 sequence
    return "";
  }
}
