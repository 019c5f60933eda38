import { describe, expect, it } from "vitest";
import {
  ERROR_CATALOG,
  getAllErrorCodes,
  getCatalogEntry,
  isValidErrorCode,
} from "../../index.js";

describe("ERROR_CATALOG", () => {
  it("should have all expected domains", () => {
    const domains = new Set(Object.values(ERROR_CATALOG).map((e) => e.domain));

    expect([...domains].sort()).toEqual(["a2a", "config", "internal"]);
  });

  it("should have valid HTTP status codes for all entries", () => {
    for (const entry of Object.values(ERROR_CATALOG)) {
      expect(entry.httpStatus).toBeGreaterThanOrEqual(400);
      expect(entry.httpStatus).toBeLessThan(600);
    }
  });

  it("should have UPPER_SNAKE_CASE codes prefixed by their domain", () => {
    for (const [code, entry] of Object.entries(ERROR_CATALOG)) {
      expect(code).toMatch(/^[A-Z][A-Z0-9_]*$/);
      expect(code.startsWith(`${entry.domain.toUpperCase()}_`)).toBe(true);
    }
  });

  it("should have titles and descriptions for all entries", () => {
    for (const entry of Object.values(ERROR_CATALOG)) {
      expect(entry.title).toBeTruthy();
      expect(entry.description).toBeTruthy();
    }
  });

  it("should mark only 4xx entries as expected", () => {
    for (const entry of Object.values(ERROR_CATALOG)) {
      expect(entry.isExpected).toBe(entry.httpStatus < 500);
    }
  });
});

describe("catalog helpers", () => {
  it("getCatalogEntry returns the entry", () => {
    expect(getCatalogEntry("A2A_UNREACHABLE").httpStatus).toBe(503);
  });

  it("isValidErrorCode rejects unknown and inherited keys", () => {
    expect(isValidErrorCode("A2A_RPC_ERROR")).toBe(true);
    expect(isValidErrorCode("NOPE")).toBe(false);
    expect(isValidErrorCode("toString")).toBe(false);
  });

  it("getAllErrorCodes lists every code", () => {
    expect(getAllErrorCodes()).toHaveLength(Object.keys(ERROR_CATALOG).length);
    expect(getAllErrorCodes()).toContain("A2A_TASK_TERMINAL");
  });
});
