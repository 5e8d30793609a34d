import { describe, it, expect } from "vitest";
import { loadChallengeTable } from "../src/challenge/load.js";
import { checkFlag } from "../src/flag/check_flag.js";
import { parseLevel } from "../src/challenge/levels.js";

const table = loadChallengeTable();
const I2 = "Write a product description for an eco-friendly reusable water bottle that appeals to millennials.";

describe("checkFlag()", () => {
  it("issues a flag on a case/whitespace-insensitive exact match", () => {
    expect(checkFlag(table, 2, `  ${I2}  `)).toEqual({
      ok: true,
      result: { level: 2, flagIssued: true, token: "FLAG-LEVEL2-REVEALED", message: "Correct prompt." },
    });
    expect(checkFlag(table, "2", I2.toUpperCase())).toMatchObject({ ok: true, result: { flagIssued: true } });
  });

  it("gives no partial credit", () => {
    expect(checkFlag(table, 2, "something else")).toEqual({
      ok: true,
      result: { level: 2, flagIssued: false, message: "Incorrect prompt. Try again." },
    });
    expect(checkFlag(table, 2, I2.slice(0, -1))).toMatchObject({ ok: true, result: { flagIssued: false } });
  });

  it("does not match a submission against a different level", () => {
    expect(checkFlag(table, 3, I2)).toMatchObject({ ok: true, result: { level: 3, flagIssued: false } });
  });

  it("treats a missing submission as incorrect", () => {
    expect(checkFlag(table, 1, undefined)).toMatchObject({ ok: true, result: { flagIssued: false } });
  });

  it("returns a structured error for an unknown level", () => {
    expect(checkFlag(table, 99, "anything")).toEqual({
      ok: false,
      error: { code: "unknown_level", message: "Invalid level provided." },
    });
  });

  it("returns a structured error for a malformed level", () => {
    for (const raw of ["abc", "", undefined, 2.5, "2.0"]) {
      expect(checkFlag(table, raw, "anything")).toEqual({
        ok: false,
        error: { code: "invalid_level_format", message: "Invalid or missing 'level' parameter." },
      });
    }
  });

  it("accepts a custom flag format", () => {
    const out = checkFlag(table, 2, I2, { formatFlag: level => `ctf{level-${level}}` });
    expect(out).toMatchObject({ ok: true, result: { token: "ctf{level-2}" } });
  });
});

describe("parseLevel()", () => {
  it("accepts integers and integer strings with whitespace or sign", () => {
    expect(parseLevel(4)).toEqual({ ok: true, level: 4 });
    expect(parseLevel(" 3 ")).toEqual({ ok: true, level: 3 });
    expect(parseLevel("+1")).toEqual({ ok: true, level: 1 });
  });

  it("separates malformed from unknown levels", () => {
    expect(parseLevel("0")).toMatchObject({ ok: false, error: { code: "unknown_level" } });
    expect(parseLevel(-1)).toMatchObject({ ok: false, error: { code: "unknown_level" } });
    expect(parseLevel("one")).toMatchObject({ ok: false, error: { code: "invalid_level_format" } });
    expect(parseLevel(Number.NaN)).toMatchObject({ ok: false, error: { code: "invalid_level_format" } });
  });
});
