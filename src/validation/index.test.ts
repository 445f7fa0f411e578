import { describe, expect, it } from "vitest";
import { FIXED_NOW, makeDraft } from "../testing/fixtures";
import { JobValidator } from "./index";

const validator = new JobValidator({
  minDescriptionLength: 50,
  allowedCountries: ["US", "CA"],
  now: () => FIXED_NOW,
});

describe("JobValidator.validate", () => {
  it("accepts a complete posting", () => {
    expect(validator.validate(makeDraft())).toEqual({ ok: true, errors: [] });
  });

  it("collects every failure", () => {
    const result = validator.validate(
      makeDraft({ title: "", company: "n/a", location: "  ", description: "Hi" }),
    );
    expect(result).toEqual({
      ok: false,
      errors: [
        "Title is required",
        'Company is a placeholder: "n/a"',
        "Location is required",
        "Description too short (2 < 50 characters)",
      ],
    });
  });

  it("checks minimum lengths", () => {
    expect(validator.validate(makeDraft({ title: "QA", company: "X" })).errors).toEqual([
      "Title too short (min 3 characters)",
      "Company too short (min 2 characters)",
    ]);
  });

  it("checks the company as it will be stored", () => {
    expect(validator.validate(makeDraft({ company: "Unknown Inc." })).errors).toEqual([
      'Company is a placeholder: "Unknown Inc."',
    ]);
    expect(validator.validate(makeDraft({ company: "X Inc" })).errors).toEqual([
      "Company too short (min 2 characters)",
    ]);
    expect(validator.validate(makeDraft({ company: "Acme Inc." })).ok).toBe(true);
  });

  it("rejects an inverted salary range", () => {
    expect(
      validator.validate(makeDraft({ salaryMin: 200000, salaryMax: 100000 })).errors,
    ).toEqual(["Salary range invalid: minimum 200000 exceeds maximum 100000"]);
  });

  it("rejects out-of-range salaries", () => {
    expect(
      validator.validate(makeDraft({ salaryMin: -5, salaryMax: 3_000_000 })).errors,
    ).toEqual([
      "Salary minimum must be a non-negative number (got -5)",
      "Salary maximum exceeds 2000000 (got 3000000)",
    ]);
  });

  it("rejects spam", () => {
    const description =
      "Great opportunity for motivated people. Click here to apply right away today!";
    expect(validator.validate(makeDraft({ description })).errors).toEqual([
      'Description contains spam phrase: "click here"',
    ]);
  });

  it("compares countries case-insensitively", () => {
    expect(validator.validate(makeDraft({ country: " us " })).ok).toBe(true);
    expect(validator.validate(makeDraft({ country: "GB" })).errors).toEqual([
      'Country not allowed: "GB"',
    ]);
  });

  it("rejects non-http source URLs", () => {
    expect(
      validator.validate(makeDraft({ sourceURL: "ftp://jobs.example.com/1" })).errors,
    ).toEqual(['Source URL must use http(s): "ftp://jobs.example.com/1"']);
  });

  it("rejects bad posted dates", () => {
    expect(validator.validate(makeDraft({ postedDate: "not a date" })).errors).toEqual([
      'Posted date is not a valid date: "not a date"',
    ]);
    expect(validator.validate(makeDraft({ postedDate: "2026-02-01" })).errors).toEqual([
      'Posted date is in the future: "2026-02-01"',
    ]);
  });

  it("caps the number of skills", () => {
    const allSkills = Array.from({ length: 101 }, (_, i) => `skill-${i}`);
    expect(validator.validate(makeDraft({ allSkills })).errors).toEqual([
      "Too many skills (101 > 100)",
    ]);
  });
});

describe("JobValidator.sanitize", () => {
  const dirty = makeDraft({
    title: "  Backend Engineer ",
    company: "Acme Inc.",
    location: " Austin, TX ",
    city: "  ",
    country: " us ",
    remote: "yes",
    allSkills: ["Python", "python ", "AWS", ""],
    skillsRequired: ["Python"],
    sourceURL: "  ",
  });

  it("normalizes text, lists and flags", () => {
    const clean = validator.sanitize(dirty);
    expect(clean.title).toBe("Backend Engineer");
    expect(clean.company).toBe("Acme");
    expect(clean.location).toBe("Austin, TX");
    expect(clean.city).toBeNull();
    expect(clean.country).toBe("US");
    expect(clean.remote).toBe(true);
    expect(clean.allSkills).toEqual(["aws", "python"]);
    expect(clean.skillsRequired).toEqual(["python"]);
    expect(clean.sourceURL).toBeNull();
  });

  it("is idempotent", () => {
    const once = validator.sanitize(dirty);
    expect(validator.sanitize(once)).toEqual(once);
  });

  it.each([
    [true, true],
    ["TRUE", true],
    ["1", true],
    ["no", false],
    [null, false],
  ])("coerces remote %j to %j", (remote, expected) => {
    expect(validator.sanitize(makeDraft({ remote })).remote).toBe(expected);
  });
});

describe("JobValidator.validateBatch", () => {
  it("partitions and sanitizes", () => {
    const good = makeDraft({ company: "Acme LLC" });
    const bad = makeDraft({ title: "" });

    const result = validator.validateBatch([good, bad]);
    expect(result.valid.map((job) => job.company)).toEqual(["Acme"]);
    expect(result.invalid).toEqual([{ job: bad, errors: ["Title is required"] }]);
  });
});
