import { ValidationError } from "src/core/errors.ts";
import {
  validateEntity,
  validateExpiry,
  validateId,
  validateIdentifier,
  validateIds,
  validateNamespace,
  validateSubject,
} from "src/core/validation.ts";
import { describe, expect, test } from "vitest";

function errorOf(fn: () => void): ValidationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) return error;
    throw error;
  }
  throw new Error("expected a ValidationError");
}

describe("validateIdentifier", () => {
  test("accepts lowercase identifiers with digits, underscores and hyphens", () => {
    expect(validateIdentifier("can_edit-2", "relation")).toBe("can_edit-2");
  });

  test("rejects an empty value", () => {
    const error = errorOf(() => validateIdentifier("", "relation"));
    expect(error.field).toBe("relation");
    expect(error.message).toBe("relation cannot be empty");
  });

  test("rejects a leading digit", () => {
    expect(errorOf(() => validateIdentifier("1read", "relation")).message).toBe(
      "relation must start with a lowercase letter and contain only lowercase letters, numbers, underscores and hyphens (got: 1read)",
    );
  });

  test("rejects uppercase letters", () => {
    expect(
      errorOf(() => validateIdentifier("Read", "permission")).field,
    ).toBe("permission");
  });

  test("rejects values over 1024 characters", () => {
    expect(
      errorOf(
        () => validateIdentifier(`a${"b".repeat(1024)}`, "relation"),
      ).message,
    ).toBe("relation exceeds maximum length of 1024 characters");
  });

  test("rejects non-string input", () => {
    expect(errorOf(() => validateIdentifier(42, "relation")).message).toBe(
      "relation must be a string",
    );
  });
});

describe("validateId", () => {
  test("accepts mixed case, colons and slashes", () => {
    expect(validateId("Org/42:main", "resource.id")).toBe("Org/42:main");
  });

  test("rejects control characters", () => {
    expect(
      errorOf(() => validateId("abc\u0000def", "resource.id")).message,
    ).toBe("resource.id contains invalid control characters");
  });

  test("rejects surrounding whitespace", () => {
    expect(errorOf(() => validateId(" abc", "resource.id")).message).toBe(
      "resource.id cannot have leading or trailing whitespace",
    );
  });

  test("rejects a whitespace-only id as empty", () => {
    expect(errorOf(() => validateId("   ", "resource.id")).message).toBe(
      "resource.id cannot be empty",
    );
  });
});

describe("validateNamespace", () => {
  test("accepts a leading digit", () => {
    expect(validateNamespace("42-tenant")).toBe("42-tenant");
  });

  test("rejects dots", () => {
    expect(errorOf(() => validateNamespace("acme.io")).message).toBe(
      "namespace must be lowercase alphanumeric with underscores or hyphens (got: acme.io)",
    );
  });
});

describe("entity and subject validation", () => {
  test("names the failing part of an entity", () => {
    expect(
      errorOf(
        () => validateEntity({ type: "Repo", id: "acme" }, "resource"),
      ).field,
    ).toBe("resource.type");
  });

  test("validates a userset relation", () => {
    expect(
      errorOf(
        () => validateSubject(
          { type: "team", id: "eng", relation: "" },
          "subject",
        ),
      ).field,
    ).toBe("subject.relation");
  });

  test("names the index of a bad element in a list", () => {
    expect(
      errorOf(() => validateIds(["a", "b", " c"], "subjectIds")).field,
    ).toBe("subjectIds[2]");
  });
});

describe("validateExpiry", () => {
  const now = new Date("2030-01-01T00:00:00.000Z");

  test("accepts no expiry", () => {
    expect(() => validateExpiry(null, now)).not.toThrow();
  });

  test("rejects an expiry equal to now", () => {
    expect(
      errorOf(() => validateExpiry(new Date(now.getTime()), now)).message,
    ).toBe("expiresAt must be in the future");
  });

  test("rejects an invalid date", () => {
    expect(errorOf(() => validateExpiry(new Date("nope"), now)).message).toBe(
      "expiresAt is not a valid date",
    );
  });
});
