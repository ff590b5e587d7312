import { describe, expect, it } from "vitest";
import { decodeBody, decodeRequest, encodeResponse, KNOWN_COMMANDS } from "../src/wire.ts";

describe("encodeResponse", () => {
  it("writes one line and drops empty fields", () => {
    expect(encodeResponse({ ID: 3, Err: "", Miss: false, Size: 0, DiskPath: undefined })).toBe(
      '{"ID":3}\n'
    );
    expect(encodeResponse({ ID: 0, KnownCommands: [...KNOWN_COMMANDS] })).toBe(
      '{"ID":0,"KnownCommands":["get","put","close"]}\n'
    );
    expect(encodeResponse({ ID: 7, Miss: true })).toBe('{"ID":7,"Miss":true}\n');
  });
});

describe("decodeRequest", () => {
  it("parses a put request", () => {
    expect(
      decodeRequest('{"ID":1,"Command":"put","ActionID":"Aas=","OutputID":"nwA=","BodySize":5}')
    ).toEqual({ ID: 1, Command: "put", ActionID: "Aas=", OutputID: "nwA=", BodySize: 5 });
  });

  it("keeps unknown commands for the caller to answer", () => {
    expect(decodeRequest('{"ID":2,"Command":"stat"}')).toEqual({ ID: 2, Command: "stat" });
  });

  it("rejects malformed requests", () => {
    expect(() => decodeRequest("{")).toThrow(SyntaxError);
    expect(() => decodeRequest('{"Command":"get"}')).toThrow();
    expect(() => decodeRequest('{"ID":1,"Command":"put","BodySize":-1}')).toThrow();
    expect(() => decodeRequest('{"ID":1,"Command":"get","ActionID":"not base64!"}')).toThrow(
      "Invalid base64"
    );
  });
});

describe("decodeBody", () => {
  it("decodes a base64 JSON string", () => {
    expect(decodeBody('"aGVsbG8="')).toEqual(new TextEncoder().encode("hello"));
    expect(() => decodeBody("aGVsbG8=")).toThrow(SyntaxError);
  });
});
