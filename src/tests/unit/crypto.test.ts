import { describe, expect, it } from "vitest";
import {
  constantTimeEqual,
  generateNumericCode,
  generateOpaqueToken,
  hashSecret,
} from "../../libs/crypto.js";
import { GenerationError } from "../../modules/tokens/errors.js";

describe("generateNumericCode", () => {
  it("returns exactly L decimal digits for every length from 1 to 10", () => {
    for (let length = 1; length <= 10; length += 1) {
      for (let i = 0; i < 20; i += 1) {
        const code = generateNumericCode(length);
        expect(code).toHaveLength(length);
        expect(code).toMatch(/^\d+$/);
      }
    }
  });

  it("yields at least 900 distinct values over 1000 six-digit codes", () => {
    const seen = new Set<string>();
    for (let i = 0; i < 1000; i += 1) {
      seen.add(generateNumericCode(6));
    }
    expect(seen.size).toBeGreaterThanOrEqual(900);
  });

  it.each([0, 11, -1, 2.5, Number.NaN])("rejects length %s", (length) => {
    expect(() => generateNumericCode(length)).toThrow(GenerationError);
  });
});

describe("generateOpaqueToken", () => {
  it("encodes 32 random bytes as 43 base64url characters", () => {
    const token = generateOpaqueToken();
    expect(token).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(Buffer.from(token, "base64url")).toHaveLength(32);
  });

  it("does not repeat", () => {
    expect(generateOpaqueToken()).not.toBe(generateOpaqueToken());
  });

  it("refuses fewer than 256 bits", () => {
    expect(() => generateOpaqueToken(16)).toThrow(GenerationError);
  });
});

describe("hashSecret", () => {
  it("is deterministic with a fixed 64-char hex output", () => {
    const digest = hashSecret("123456");
    expect(digest).toBe(hashSecret("123456"));
    expect(digest).toMatch(/^[0-9a-f]{64}$/);
  });

  it("matches the SHA-256 of the input without a pepper", () => {
    expect(hashSecret("abc")).toBe(
      "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
    );
  });

  it("differs for distinct inputs and for different peppers", () => {
    expect(hashSecret("123456")).not.toBe(hashSecret("123457"));
    expect(hashSecret("123456", "pepper-a")).not.toBe(hashSecret("123456"));
    expect(hashSecret("123456", "pepper-a")).not.toBe(hashSecret("123456", "pepper-b"));
  });
});

describe("constantTimeEqual", () => {
  it("agrees with hash equality in both directions", () => {
    const a = hashSecret("000001");
    const b = hashSecret("000001");
    const c = hashSecret("000002");

    expect(constantTimeEqual(a, b)).toBe(true);
    expect(constantTimeEqual(a, c)).toBe(false);
  });

  it("returns false for inputs of different length", () => {
    expect(constantTimeEqual("abc", "abcd")).toBe(false);
    expect(constantTimeEqual("", "a")).toBe(false);
  });
});
