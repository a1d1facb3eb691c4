import { describe, expect, it } from "vitest";

import { PgfErrorCode, linearizeFields, linearizeTree, mkTree, readTree } from "../../src/index.js";
import { buildGrammar, foodGrammar, requireConcrete } from "../fixtures/grammars/index.js";

const grammar = foodGrammar();
const eng = requireConcrete(grammar, "FoodEng");
const ita = requireConcrete(grammar, "FoodIta");

describe("linearizeTree", () => {
  it("realizes agreement in English", () => {
    expect(linearizeTree(eng, readTree("Pred (These Wine) (Very Italian)"))).toEqual({
      ok: true,
      value: "these wines are very Italian",
    });
    expect(linearizeTree(eng, readTree("Pred (This (Mod Italian Pizza)) Expensive"))).toEqual({
      ok: true,
      value: "this Italian pizza is expensive",
    });
  });

  it("realizes gender and number agreement in Italian", () => {
    expect(linearizeTree(ita, readTree("Pred (These Wine) Delicious"))).toEqual({
      ok: true,
      value: "questi vini sono deliziosi",
    });
    expect(linearizeTree(ita, readTree("Pred (This (Mod Italian Pizza)) Expensive"))).toEqual({
      ok: true,
      value: "questa pizza italiana è cara",
    });
    expect(linearizeTree(ita, readTree("Pred (Those Pizza) (Very Delicious)"))).toEqual({
      ok: true,
      value: "quelle pizze sono molto deliziose",
    });
  });

  it("joins every field of a multi-field root", () => {
    expect(linearizeTree(eng, mkTree("Pizza"))).toEqual({ ok: true, value: "pizza pizzas" });
  });

  it("reports functions without a linearization", () => {
    const result = linearizeTree(eng, mkTree("Banana"));

    expect(result).toEqual({
      ok: false,
      error: {
        code: PgfErrorCode.MissingLinearization,
        message: 'Function "Banana" has no linearization in FoodEng',
        details: { language: "FoodEng" },
      },
    });
  });

  it("reports children of the wrong category", () => {
    const result = linearizeTree(eng, mkTree("Pred", mkTree("Pizza"), mkTree("Delicious")));

    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.code).toBe(PgfErrorCode.InvalidTree);
    expect(!result.ok && result.error.message).toBe('"Pizza" has category Kind where Item is expected');
  });

  it("reports the wrong number of arguments", () => {
    const result = linearizeTree(eng, mkTree("Pred", mkTree("This", mkTree("Pizza"))));

    expect(!result.ok && result.error.message).toBe('"Pred" takes 2 argument(s) but was given 1');
  });

  it("reports a parameter value with no alternative", () => {
    const concrete = requireConcrete(
      buildGrammar({
        name: "Count",
        startCategory: "S",
        categories: ["S", "N"],
        functions: [
          ["Say", ["N"], "S"],
          ["Many", [], "N"],
        ],
        languages: [
          {
            language: "CountEng",
            rules: [
              { fun: "Say", fields: [[{ choose: [0, 0], alts: [["one"]] }, [0, 0]]] },
              { fun: "Many", fields: [["many"]], params: [2] },
            ],
          },
        ],
      }),
      "CountEng"
    );
    const result = linearizeTree(concrete, readTree("Say Many"));

    expect(!result.ok && result.error.code).toBe(PgfErrorCode.MissingLinearization);
    expect(!result.ok && result.error.message).toBe('"Say" has no alternative for parameter value 2');
  });
});

describe("linearizeFields", () => {
  it("returns each field and the parameters of the root", () => {
    expect(linearizeFields(ita, readTree("Mod Delicious Wine"))).toEqual({
      ok: true,
      value: {
        category: "Kind",
        fields: [
          ["vino", "delizioso"],
          ["vini", "deliziosi"],
        ],
        parameters: [0, 0, 2],
      },
    });
  });
});
