import type { ConcreteSyntax, Grammar } from "../../../src/index.js";
import { buildGrammar } from "./builder.js";
import { foodSpec } from "./food.js";
import { loopSpec, menuSpec, switchSpec } from "./small.js";

export { buildGrammar } from "./builder.js";
export type { GrammarSpec, LanguageSpec } from "./builder.js";
export { foodEng, foodIta, foodSpec } from "./food.js";
export { loopSpec, menuSpec, switchSpec } from "./small.js";

export const foodGrammar = (): Grammar => buildGrammar(foodSpec);
export const menuGrammar = (): Grammar => buildGrammar(menuSpec);
export const switchGrammar = (): Grammar => buildGrammar(switchSpec);
export const loopGrammar = (): Grammar => buildGrammar(loopSpec);

export function requireConcrete(grammar: Grammar, language: string): ConcreteSyntax {
  const concrete = grammar.concrete(language);
  if (!concrete) {
    throw new Error(`Fixture grammar has no ${language} concrete syntax`);
  }
  return concrete;
}

/** Position of the first occurrence of `needle` in `haystack`, or -1. */
export function indexOfBytes(haystack: Uint8Array, needle: Uint8Array): number {
  outer: for (let start = 0; start + needle.length <= haystack.length; start += 1) {
    for (let offset = 0; offset < needle.length; offset += 1) {
      if (haystack[start + offset] !== needle[offset]) {
        continue outer;
      }
    }
    return start;
  }
  return -1;
}

export function catchError(action: () => unknown): unknown {
  try {
    action();
  } catch (error) {
    return error;
  }
  throw new Error("Expected the action to throw");
}
