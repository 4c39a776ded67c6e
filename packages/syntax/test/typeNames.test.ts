import { describe, it, expect } from "vitest";
import { normalizeTypeText } from "../src/infrastructure/parsers/typeNames.js";

describe("normalizeTypeText", () => {
  it("keeps a simple name", () => {
    expect(normalizeTypeText("String")).toEqual({ name: "String", dimensions: 0 });
  });

  it("drops nested type arguments and counts array dimensions", () => {
    expect(normalizeTypeText("Map<String, List<Item>>[]")).toEqual({ name: "Map", dimensions: 1 });
  });

  it("keeps qualifiers", () => {
    expect(normalizeTypeText("java.util.List<String>")).toEqual({
      name: "java.util.List",
      dimensions: 0,
    });
  });

  it("erases arguments of an outer type in a member type reference", () => {
    expect(normalizeTypeText("Outer<String>.Inner")).toEqual({ name: "Outer.Inner", dimensions: 0 });
  });

  it("counts multiple dimensions", () => {
    expect(normalizeTypeText("int[][]")).toEqual({ name: "int", dimensions: 2 });
  });

  it("strips annotations with and without arguments", () => {
    expect(normalizeTypeText("@NonNull String")).toEqual({ name: "String", dimensions: 0 });
    expect(normalizeTypeText("@Size(max = 3) byte []")).toEqual({ name: "byte", dimensions: 1 });
  });
});
