import type { Grammar } from "../grammar/grammar.js";
import type {
  ConcreteSyntax,
  Flags,
  ParameterValue,
  PgfSymbol,
  PmcfgRule,
} from "../grammar/types.js";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * Projects a grammar onto plain JSON data. Object keys are inserted in the
 * grammar's declaration order, so `JSON.stringify` output is deterministic.
 *
 * JavaScript objects list integer-like keys (`"0"`, `"42"`) before all others
 * in ascending numeric order, so identifiers of that shape lose their
 * declaration position. `abstract.categories` and `literals` are arrays and
 * always keep it.
 */
export function grammarToJson(grammar: Grammar): JsonObject {
  const funs: JsonObject = {};
  for (const signature of grammar.functions.values()) {
    funs[signature.name] = {
      args: [...signature.args],
      cat: signature.result,
      prob: signature.probability,
    };
  }

  const concretes: JsonObject = {};
  for (const [language, concrete] of grammar.concretes) {
    concretes[language] = concreteToJson(concrete);
  }

  return {
    abstract: {
      name: grammar.name,
      startcat: grammar.startCategory,
      flags: flagsToJson(grammar.flags),
      categories: [...grammar.categories],
      funs,
    },
    concretes,
  };
}

function concreteToJson(concrete: ConcreteSyntax): JsonObject {
  const printnames: JsonObject = {};
  for (const [name, text] of concrete.printNames) {
    printnames[name] = text;
  }
  const productions: JsonObject = {};
  for (const [category, rules] of concrete.productions) {
    productions[category] = rules.map(ruleToJson);
  }
  return {
    flags: flagsToJson(concrete.flags),
    printnames,
    literals: [...concrete.literals],
    sequences: concrete.sequences.map((sequence) => sequence.map(symbolToJson)),
    productions,
  };
}

function flagsToJson(flags: Flags): JsonObject {
  const result: JsonObject = {};
  for (const [key, value] of flags) {
    result[key] = value;
  }
  return result;
}

function symbolToJson(symbol: PgfSymbol): JsonObject {
  switch (symbol.kind) {
    case "literal":
      return { type: "SymLit", args: [symbol.index, symbol.token] };
    case "argument":
      return { type: "SymCat", args: [symbol.argument, symbol.field] };
    case "choice":
      return {
        type: "SymChoice",
        args: [
          symbol.argument,
          symbol.parameter,
          symbol.alternatives.map((alternative) => alternative.map(symbolToJson)),
        ],
      };
  }
}

function ruleToJson(rule: PmcfgRule): JsonObject {
  return {
    fun: rule.function,
    args: [...rule.args],
    lins: [...rule.fields],
    params: rule.parameters.map(parameterToJson),
  };
}

function parameterToJson(parameter: ParameterValue): JsonValue {
  return parameter.kind === "constant"
    ? parameter.value
    : { arg: parameter.argument, slot: parameter.slot };
}
