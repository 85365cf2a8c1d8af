import { ProtocolError } from "../schemas/errors.js";

const DATA_URL_MARKER = "base64,";
const BASE64_PATTERN = /^[A-Za-z0-9+/_-]*={0,2}$/;

/**
 * Decode a base64 payload, optionally carrying a `data:<mime>;base64,` prefix.
 * Whitespace is ignored. Anything else outside the base64 alphabet is rejected.
 */
export function decodeBase64Payload(value: string, field: string): Buffer {
  const markerIndex = value.indexOf(DATA_URL_MARKER);
  const body =
    markerIndex >= 0 ? value.slice(markerIndex + DATA_URL_MARKER.length) : value;
  const compact = body.replace(/\s+/g, "");

  if (compact.length === 0) {
    throw new ProtocolError(`Empty ${field} payload`);
  }
  if (!BASE64_PATTERN.test(compact)) {
    throw new ProtocolError(`Invalid base64 in ${field}`);
  }
  return Buffer.from(compact, "base64");
}

export function encodeBase64(data: Buffer): string {
  return data.toString("base64");
}
