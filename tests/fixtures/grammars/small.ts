import type { GrammarSpec } from "./builder.js";

/** Left- and right-nested coordination give two trees for three dishes. */
export const menuSpec: GrammarSpec = {
  name: "Menu",
  startCategory: "Dish",
  categories: ["Dish"],
  functions: [
    ["And", ["Dish", "Dish"], "Dish"],
    ["Fish", [], "Dish"],
    ["Chips", [], "Dish"],
    ["Peas", [], "Dish"],
  ],
  languages: [
    {
      language: "MenuEng",
      rules: [
        { fun: "And", fields: [[[0, 0], "and", [1, 0]]] },
        { fun: "Fish", fields: [["fish"]] },
        { fun: "Chips", fields: [["chips"]] },
        { fun: "Peas", fields: [["peas"]] },
      ],
    },
  ],
};

/** Particle verbs: the particle follows the object. */
export const switchSpec: GrammarSpec = {
  name: "Switch",
  startCategory: "Clause",
  categories: ["Clause", "Verb", "Object"],
  functions: [
    ["Use", ["Verb", "Object"], "Clause"],
    ["SwitchOff", [], "Verb"],
    ["TurnOn", [], "Verb"],
    ["Light", [], "Object"],
    ["Radio", [], "Object"],
  ],
  languages: [
    {
      language: "SwitchEng",
      rules: [
        { fun: "Use", fields: [[[0, 0], [1, 0], [0, 1]]] },
        { fun: "SwitchOff", fields: [["switch"], ["off"]] },
        { fun: "TurnOn", fields: [["turn"], ["on"]] },
        { fun: "Light", fields: [["the", "light"]] },
        { fun: "Radio", fields: [["the", "radio"]] },
      ],
    },
  ],
};

/** A unit rule that maps a category onto itself. */
export const loopSpec: GrammarSpec = {
  name: "Loop",
  startCategory: "A",
  categories: ["A"],
  functions: [
    ["Wrap", ["A"], "A"],
    ["Leaf", [], "A"],
  ],
  languages: [
    {
      language: "LoopEng",
      rules: [
        { fun: "Wrap", fields: [[[0, 0]]] },
        { fun: "Leaf", fields: [["leaf"]] },
      ],
    },
  ],
};
