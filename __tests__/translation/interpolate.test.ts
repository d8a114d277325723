import { describe, expect, it } from "vitest";
import { interpolate } from "@/translation/interpolate";

describe("interpolate", () => {
  it("substitutes a numeric binding", () => {
    expect(interpolate("must be greater than %{number}", { number: 0 })).toBe(
      "must be greater than 0",
    );
  });

  it("substitutes every occurrence of every placeholder", () => {
    expect(interpolate("%{a}-%{b}-%{a}", { a: "x", b: 2 })).toBe("x-2-x");
  });

  it("keeps placeholders that have no binding", () => {
    expect(interpolate("between %{min} and %{max}", { min: 1 })).toBe(
      "between 1 and %{max}",
    );
  });

  it("does not read inherited properties as bindings", () => {
    expect(interpolate("%{toString}", {})).toBe("%{toString}");
  });

  it("renders symbols by their description and bigints in decimal", () => {
    expect(
      interpolate("%{kind} up to %{max}", { kind: Symbol("integer"), max: 10n }),
    ).toBe("integer up to 10");
  });

  it("returns templates without placeholders unchanged", () => {
    expect(interpolate("can't be blank", { count: 3 })).toBe("can't be blank");
  });
});
