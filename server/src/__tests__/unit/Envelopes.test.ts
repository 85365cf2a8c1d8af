/**
 * Envelope parsing and base64 payload Unit Tests
 */

import { z } from "zod";
import { formatIssues, parseEnvelope } from "../../schemas/envelopes.js";
import { ProtocolError } from "../../schemas/errors.js";
import { decodeBase64Payload, encodeBase64 } from "../../utils/base64.js";

describe("parseEnvelope", () => {
  it("should keep every field of a typed envelope", () => {
    expect(parseEnvelope('{"type":"ping","extra":1}')).toEqual({
      ok: true,
      envelope: { type: "ping", extra: 1 },
    });
  });

  it("should reject text that is not JSON", () => {
    expect(parseEnvelope("not json")).toEqual({
      ok: false,
      message: "Invalid message format",
      details: expect.any(String),
    });
  });

  it("should reject an envelope without a type", () => {
    expect(parseEnvelope("{}")).toEqual({
      ok: false,
      message: "Invalid message format",
      details: "type: Required",
    });
    expect(parseEnvelope('{"type":""}')).toEqual({
      ok: false,
      message: "Invalid message format",
      details: "type: String must contain at least 1 character(s)",
    });
  });

  it("should reject a JSON value that is not an object", () => {
    expect(parseEnvelope("[1]")).toEqual({
      ok: false,
      message: "Invalid message format",
      details: "Expected object, received array",
    });
  });
});

describe("formatIssues", () => {
  it("should join nested paths and issues", () => {
    const schema = z.object({ a: z.object({ b: z.number() }), c: z.string() });
    const result = schema.safeParse({ a: { b: "x" }, c: 1 });
    if (result.success) throw new Error("expected a validation failure");

    expect(formatIssues(result.error)).toBe(
      "a.b: Expected number, received string; c: Expected string, received number",
    );
  });
});

describe("decodeBase64Payload", () => {
  it("should decode plain base64", () => {
    expect(decodeBase64Payload("aGk=", "audio")).toEqual(Buffer.from("hi"));
  });

  it("should strip a data URL prefix and whitespace", () => {
    expect(decodeBase64Payload("data:image/png;base64,AA AA\n", "image")).toEqual(
      Buffer.from([0, 0, 0]),
    );
  });

  it("should reject an empty payload", () => {
    expect(() => decodeBase64Payload("", "frame")).toThrow("Empty frame payload");
    expect(() => decodeBase64Payload("data:image/jpeg;base64,  ", "frame")).toThrow(
      "Empty frame payload",
    );
  });

  it("should reject characters outside the base64 alphabet", () => {
    expect(() => decodeBase64Payload("abc$", "audio")).toThrow(ProtocolError);
    expect(() => decodeBase64Payload("abc$", "audio")).toThrow("Invalid base64 in audio");
  });

  it("should encode back to base64", () => {
    expect(encodeBase64(Buffer.from("hi"))).toBe("aGk=");
  });
});
