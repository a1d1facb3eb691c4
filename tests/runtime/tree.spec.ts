import { describe, expect, it } from "vitest";

import {
  PgfError,
  PgfErrorCode,
  mkTree,
  readTree,
  showTree,
  treesEqual,
  uniqueTrees,
} from "../../src/index.js";
import { catchError } from "../fixtures/grammars/index.js";

describe("showTree", () => {
  it("prints nested applications in prefix notation", () => {
    const tree = mkTree("Pred", mkTree("This", mkTree("Mod", mkTree("Italian"), mkTree("Pizza"))), mkTree("Expensive"));

    expect(showTree(tree)).toBe("Pred (This (Mod Italian Pizza)) Expensive");
    expect(showTree(mkTree("Pizza"))).toBe("Pizza");
  });
});

describe("readTree", () => {
  it("reads what showTree prints", () => {
    const text = "And (And Fish Chips) (Peas)";
    const tree = readTree(text);

    expect(tree).toEqual(
      mkTree("And", mkTree("And", mkTree("Fish"), mkTree("Chips")), mkTree("Peas"))
    );
    expect(showTree(tree)).toBe("And (And Fish Chips) Peas");
    expect(readTree("  (Pred  (This Pizza)   Delicious) ")).toEqual(
      mkTree("Pred", mkTree("This", mkTree("Pizza")), mkTree("Delicious"))
    );
  });

  it.each([
    ["", "Expected a function name"],
    ["Pred (This Pizza", "Expected ')'"],
    ["Pred )", 'Unexpected ")"'],
    [")", "Unexpected ')'"],
    ["(This Pizza) Delicious", "A parenthesized application cannot take further arguments"],
  ])("rejects %j", (text, message) => {
    const error = catchError(() => readTree(text));

    expect(error).toBeInstanceOf(PgfError);
    expect(error).toMatchObject({ code: PgfErrorCode.InvalidTree });
    expect(error).toHaveProperty("message", `${message} in "${text.trim()}"`);
  });
});

describe("tree comparison", () => {
  it("compares structurally and removes duplicates", () => {
    const left = readTree("And Fish (And Chips Peas)");
    const right = readTree("And (And Fish Chips) Peas");

    expect(treesEqual(left, readTree("And Fish (And Chips Peas)"))).toBe(true);
    expect(treesEqual(left, right)).toBe(false);
    expect(uniqueTrees([left, right, readTree("And Fish (And Chips Peas)")])).toEqual([left, right]);
  });
});
