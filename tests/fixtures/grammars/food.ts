import type { GrammarSpec, LanguageSpec } from "./builder.js";

/** Number agreement through parameters and erased table cells. */
export const foodEng: LanguageSpec = {
  language: "FoodEng",
  flags: { language: "en_US" },
  printNames: { Pizza: "pizza", Comment: "comment" },
  rules: [
    { fun: "Pred", fields: [[[0, 0], { choose: [0, 0], alts: [["is"], ["are"]] }, [1, 0]]] },
    { fun: "This", fields: [["this", [0, 0]]], params: [0] },
    { fun: "That", fields: [["that", [0, 0]]], params: [0] },
    { fun: "These", fields: [["these", [0, 1]]], params: [1] },
    { fun: "Those", fields: [["those", [0, 1]]], params: [1] },
    { fun: "Mod", fields: [[[0, 0], [1, 0]], [[0, 0], [1, 1]]] },
    { fun: "Pizza", fields: [["pizza"], ["pizzas"]] },
    { fun: "Wine", fields: [["wine"], ["wines"]] },
    { fun: "Cheese", fields: [["cheese"], ["cheeses"]] },
    { fun: "Very", fields: [["very", [0, 0]]] },
    { fun: "Delicious", fields: [["delicious"]] },
    { fun: "Italian", fields: [["Italian"]] },
    { fun: "Expensive", fields: [["expensive"]] },
  ],
};

const agreeing = [[[0, 0]], [[0, 1]], [[0, 2]], [[0, 3]]] as const;
const predicative = [[[1, 0]], [[1, 1]], [[1, 2]], [[1, 3]]] as const;

/**
 * Kind parameters are gender, singular agreement and plural agreement, where
 * agreement indexes the four adjective forms (m.sg, f.sg, m.pl, f.pl).
 */
export const foodIta: LanguageSpec = {
  language: "FoodIta",
  flags: { language: "it_IT" },
  rules: [
    {
      fun: "Pred",
      fields: [
        [
          [0, 0],
          { choose: [0, 0], alts: [["è"], ["sono"]] },
          { choose: [0, 1], alts: predicative },
        ],
      ],
    },
    {
      fun: "This",
      fields: [[{ choose: [0, 0], alts: [["questo"], ["questa"]] }, [0, 0]]],
      params: [0, { arg: 0, slot: 1 }],
    },
    {
      fun: "That",
      fields: [[{ choose: [0, 0], alts: [["quel"], ["quella"]] }, [0, 0]]],
      params: [0, { arg: 0, slot: 1 }],
    },
    {
      fun: "These",
      fields: [[{ choose: [0, 0], alts: [["questi"], ["queste"]] }, [0, 1]]],
      params: [1, { arg: 0, slot: 2 }],
    },
    {
      fun: "Those",
      fields: [[{ choose: [0, 0], alts: [["quei"], ["quelle"]] }, [0, 1]]],
      params: [1, { arg: 0, slot: 2 }],
    },
    {
      fun: "Mod",
      fields: [
        [[1, 0], { choose: [1, 1], alts: agreeing }],
        [[1, 1], { choose: [1, 2], alts: agreeing }],
      ],
      params: [
        { arg: 1, slot: 0 },
        { arg: 1, slot: 1 },
        { arg: 1, slot: 2 },
      ],
    },
    { fun: "Pizza", fields: [["pizza"], ["pizze"]], params: [1, 1, 3] },
    { fun: "Wine", fields: [["vino"], ["vini"]], params: [0, 0, 2] },
    { fun: "Cheese", fields: [["formaggio"], ["formaggi"]], params: [0, 0, 2] },
    {
      fun: "Very",
      fields: [
        ["molto", [0, 0]],
        ["molto", [0, 1]],
        ["molto", [0, 2]],
        ["molto", [0, 3]],
      ],
    },
    { fun: "Delicious", fields: [["delizioso"], ["deliziosa"], ["deliziosi"], ["deliziose"]] },
    { fun: "Italian", fields: [["italiano"], ["italiana"], ["italiani"], ["italiane"]] },
    { fun: "Expensive", fields: [["caro"], ["cara"], ["cari"], ["care"]] },
  ],
};

export const foodSpec: GrammarSpec = {
  name: "Food",
  startCategory: "Comment",
  flags: { startcat: "Comment" },
  categories: ["Comment", "Item", "Kind", "Quality"],
  functions: [
    ["Pred", ["Item", "Quality"], "Comment"],
    ["This", ["Kind"], "Item"],
    ["That", ["Kind"], "Item"],
    ["These", ["Kind"], "Item"],
    ["Those", ["Kind"], "Item"],
    ["Mod", ["Quality", "Kind"], "Kind"],
    ["Pizza", [], "Kind"],
    ["Wine", [], "Kind"],
    ["Cheese", [], "Kind"],
    ["Very", ["Quality"], "Quality"],
    ["Delicious", [], "Quality"],
    ["Italian", [], "Quality"],
    ["Expensive", [], "Quality"],
  ],
  languages: [foodEng, foodIta],
};
