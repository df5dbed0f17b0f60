/**
 * Tests for error-utils.ts
 */

import { describe, it, expect } from "@jest/globals";
import { isNotFoundError, isPermissionError, getErrorMessage } from "../error-utils.js";

describe("isNotFoundError", () => {
  it("matches ENOENT on errors and plain objects", () => {
    expect(isNotFoundError(Object.assign(new Error("no such file"), { code: "ENOENT" }))).toBe(true);
    expect(isNotFoundError({ code: "ENOENT" })).toBe(true);
  });

  it("rejects other codes, missing codes and non-string codes", () => {
    expect(isNotFoundError(Object.assign(new Error("bad"), { code: "EACCES" }))).toBe(false);
    expect(isNotFoundError(new Error("generic"))).toBe(false);
    expect(isNotFoundError({ code: 2 })).toBe(false);
    expect(isNotFoundError(null)).toBe(false);
    expect(isNotFoundError("ENOENT")).toBe(false);
  });
});

describe("isPermissionError", () => {
  it("matches EACCES and EPERM", () => {
    expect(isPermissionError({ code: "EACCES" })).toBe(true);
    expect(isPermissionError({ code: "EPERM" })).toBe(true);
  });

  it("rejects anything else", () => {
    expect(isPermissionError({ code: "ENOENT" })).toBe(false);
    expect(isPermissionError(undefined)).toBe(false);
  });
});

describe("getErrorMessage", () => {
  it("extracts message from Error instances", () => {
    expect(getErrorMessage(new Error("bus closed"))).toBe("bus closed");
  });

  it("returns strings as-is and stringifies the rest", () => {
    expect(getErrorMessage("raw")).toBe("raw");
    expect(getErrorMessage(42)).toBe("42");
    expect(getErrorMessage(null)).toBe("null");
    expect(getErrorMessage({ key: "value" })).toBe("[object Object]");
  });
});
