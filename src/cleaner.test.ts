import { describe, expect, test } from "vitest";
import {
  cleanPatientRecord,
  cleanPatientRecords,
  coerceAge,
  titleCase,
} from "./cleaner";

describe("name normalization", () => {
  test("capitalizes each word", () => {
    expect(titleCase("john smith")).toBe("John Smith");
  });

  test("lower-cases the rest of each word", () => {
    expect(titleCase("MARY o'neil")).toBe("Mary O'Neil");
    expect(titleCase("jean-luc picard")).toBe("Jean-Luc Picard");
  });

  test("missing names become empty strings", () => {
    expect(titleCase(null)).toBe("");
    expect(titleCase(undefined)).toBe("");
  });
});

describe("age coercion", () => {
  test("parses numbers and numeric strings", () => {
    expect(coerceAge(45)).toBe(45);
    expect(coerceAge("32")).toBe(32);
    expect(coerceAge(" 41 ")).toBe(41);
  });

  test("truncates fractions", () => {
    expect(coerceAge("67.8")).toBe(67);
    expect(coerceAge(18.9)).toBe(18);
  });

  test("invalid or missing ages become 0", () => {
    expect(coerceAge("thirty")).toBe(0);
    expect(coerceAge("")).toBe(0);
    expect(coerceAge(undefined)).toBe(0);
    expect(coerceAge(null)).toBe(0);
    expect(coerceAge(true)).toBe(0);
    expect(coerceAge(Number.NaN)).toBe(0);
    expect(coerceAge(Number.POSITIVE_INFINITY)).toBe(0);
  });

  test("hex, binary and octal text is not a valid age", () => {
    expect(coerceAge("0x20")).toBe(0);
    expect(coerceAge("0b10100")).toBe(0);
    expect(coerceAge("0o40")).toBe(0);
    expect(coerceAge("Infinity")).toBe(0);
  });

  test("accepts signed and exponent decimal forms", () => {
    expect(coerceAge("+25")).toBe(25);
    expect(coerceAge(".5")).toBe(0);
    expect(coerceAge("3e1")).toBe(30);
  });
});

describe("cleanPatientRecord", () => {
  test("fills missing fields and drops extra keys", () => {
    expect(cleanPatientRecord({ age: "51", mrn: "X-1" })).toEqual({
      name: "",
      age: 51,
      gender: null,
      diagnosis: null,
    });
  });
});

describe("cleanPatientRecords", () => {
  test("normalizes a valid adult record", () => {
    expect(
      cleanPatientRecords([
        { name: "john smith", age: "32", gender: "male", diagnosis: "flu" },
      ])
    ).toEqual([{ name: "John Smith", age: 32, gender: "male", diagnosis: "flu" }]);
  });

  test("filters out minors", () => {
    expect(
      cleanPatientRecords([
        { name: "ann", age: "15", gender: "female", diagnosis: "asthma" },
      ])
    ).toEqual([]);
  });

  test("drops records whose age cannot be parsed", () => {
    expect(
      cleanPatientRecords([
        { name: "bob", age: "notanumber", gender: "male", diagnosis: "flu" },
      ])
    ).toEqual([]);
  });

  test("drops records whose age is written in another base", () => {
    expect(
      cleanPatientRecords([
        { name: "x", age: "0x20", gender: "male", diagnosis: "flu" },
      ])
    ).toEqual([]);
  });

  test("keeps records at exactly 18", () => {
    expect(
      cleanPatientRecords([{ name: "eve", age: 18, gender: "female" }])
    ).toEqual([{ name: "Eve", age: 18, gender: "female", diagnosis: null }]);
  });

  test("removes duplicates, keeping the first occurrence in order", () => {
    const out = cleanPatientRecords([
      { name: "ann lee", age: "40", gender: "female", diagnosis: "flu" },
      { name: "tom ford", age: 50, gender: "male", diagnosis: "gout" },
      { name: "ANN LEE", age: 40, gender: "female", diagnosis: "flu" },
      { name: "ann lee", age: "40", gender: "female", diagnosis: "flu" },
    ]);
    expect(out).toEqual([
      { name: "Ann Lee", age: 40, gender: "female", diagnosis: "flu" },
      { name: "Tom Ford", age: 50, gender: "male", diagnosis: "gout" },
    ]);
  });

  test("records differing in any field are kept", () => {
    const out = cleanPatientRecords([
      { name: "ann lee", age: 40, gender: "female", diagnosis: "flu" },
      { name: "ann lee", age: 40, gender: "female", diagnosis: "gout" },
    ]);
    expect(out).toHaveLength(2);
  });

  test("is idempotent", () => {
    const once = cleanPatientRecords([
      { name: "john smith", age: "32", gender: "male", diagnosis: "flu" },
      { name: "JOHN SMITH", age: 32.4, gender: "male", diagnosis: "flu" },
      { name: "kid", age: "9", gender: "male", diagnosis: "cold" },
      { name: "sam lee", age: 29, gender: "male" },
    ]);
    expect(cleanPatientRecords(once)).toEqual(once);
  });

  test("every retained age is an integer >= 18", () => {
    const out = cleanPatientRecords([
      { name: "a", age: "17.99" },
      { name: "b", age: "18.5" },
      { name: "c", age: "-40" },
      { name: "d", age: 90 },
    ]);
    expect(out.map((p) => p.age)).toEqual([18, 90]);
    for (const p of out) expect(Number.isInteger(p.age)).toBe(true);
  });
});
