import { describe, it } from "node:test";
import assert from "node:assert";
import { assertIsoDate, formatDisplayDate, isIsoDate } from "./dates.js";
import { ValidationError } from "./errors.js";

describe("isIsoDate", () => {
  it("accepts real calendar days", () => {
    assert.strictEqual(isIsoDate("2024-03-07"), true);
    assert.strictEqual(isIsoDate("2024-02-29"), true);
  });

  it("rejects impossible days and other layouts", () => {
    assert.strictEqual(isIsoDate("2023-02-29"), false);
    assert.strictEqual(isIsoDate("2024-13-01"), false);
    assert.strictEqual(isIsoDate("07.03.2024"), false);
    assert.strictEqual(isIsoDate("2024-3-7"), false);
    assert.strictEqual(isIsoDate(""), false);
  });
});

describe("assertIsoDate", () => {
  it("returns the value when valid", () => {
    assert.strictEqual(assertIsoDate("2024-12-31"), "2024-12-31");
  });

  it("throws ValidationError naming the field", () => {
    assert.throws(() => assertIsoDate("tomorrow", "dateFrom"), (e: unknown) => {
      assert.ok(e instanceof ValidationError);
      assert.strictEqual(e.message, "dateFrom must be a calendar date in YYYY-MM-DD form");
      return true;
    });
  });
});

describe("formatDisplayDate", () => {
  it("renders day.month.year", () => {
    assert.strictEqual(formatDisplayDate("2024-03-07"), "07.03.2024");
  });

  it("leaves unrecognised input alone", () => {
    assert.strictEqual(formatDisplayDate("soon"), "soon");
  });
});
