import { PgfError, PgfErrorCode } from "../errors.js";
import { createError, fail, ok } from "../result.js";
import type { PgfResult } from "../result.js";
import type { ConcreteSyntax, PgfSymbol, PmcfgRule } from "../grammar/types.js";
import { showTree } from "./tree.js";
import type { AbstractSyntaxTree } from "./tree.js";

/** Field strings and parameter values of one linearized node. */
export interface Linearization {
  readonly category: string;
  /** Tokens of each field, in field order. */
  readonly fields: readonly (readonly string[])[];
  readonly parameters: readonly number[];
}

/** Linearizes a tree and joins every field of the root into one string. */
export function linearizeTree(
  concrete: ConcreteSyntax,
  tree: AbstractSyntaxTree
): PgfResult<string> {
  const result = linearizeFields(concrete, tree);
  if (!result.ok) {
    return result;
  }
  return ok(result.value.fields.flat().join(" "));
}

export function linearizeFields(
  concrete: ConcreteSyntax,
  tree: AbstractSyntaxTree
): PgfResult<Linearization> {
  try {
    return ok(linearizeNode(concrete, tree, undefined));
  } catch (error) {
    if (error instanceof PgfError) {
      return fail(createError(error.code, error.message, { language: concrete.language }));
    }
    throw error;
  }
}

function linearizeNode(
  concrete: ConcreteSyntax,
  tree: AbstractSyntaxTree,
  expectedCategory: string | undefined
): Linearization {
  const rule = selectRule(concrete, tree, expectedCategory);
  const children = tree.args.map((child, index) =>
    linearizeNode(concrete, child, rule.args[index])
  );

  const fields = rule.fields.map((sequenceIndex) => {
    const tokens: string[] = [];
    for (const symbol of concrete.sequences[sequenceIndex] ?? []) {
      emitSymbol(symbol, children, tokens, tree);
    }
    return tokens;
  });

  const parameters = rule.parameters.map((parameter) => {
    if (parameter.kind === "constant") {
      return parameter.value;
    }
    return children[parameter.argument]?.parameters[parameter.slot] ?? 0;
  });

  return { category: rule.category, fields, parameters };
}

function selectRule(
  concrete: ConcreteSyntax,
  tree: AbstractSyntaxTree,
  expectedCategory: string | undefined
): PmcfgRule {
  const rule = concrete.rulesByFunction.get(tree.fun)?.[0];
  if (!rule) {
    throw new PgfError(
      PgfErrorCode.MissingLinearization,
      `Function "${tree.fun}" has no linearization in ${concrete.language}`
    );
  }
  if (expectedCategory !== undefined && rule.category !== expectedCategory) {
    throw new PgfError(
      PgfErrorCode.InvalidTree,
      `"${showTree(tree)}" has category ${rule.category} where ${expectedCategory} is expected`
    );
  }
  if (tree.args.length !== rule.args.length) {
    throw new PgfError(
      PgfErrorCode.InvalidTree,
      `"${tree.fun}" takes ${rule.args.length} argument(s) but was given ${tree.args.length}`
    );
  }
  return rule;
}

function emitSymbol(
  symbol: PgfSymbol,
  children: readonly Linearization[],
  tokens: string[],
  tree: AbstractSyntaxTree
): void {
  switch (symbol.kind) {
    case "literal":
      tokens.push(symbol.token);
      return;
    case "argument":
      tokens.push(...(children[symbol.argument]?.fields[symbol.field] ?? []));
      return;
    case "choice": {
      const selector = children[symbol.argument]?.parameters[symbol.parameter] ?? 0;
      const alternative = symbol.alternatives[selector];
      if (!alternative) {
        throw new PgfError(
          PgfErrorCode.MissingLinearization,
          `"${tree.fun}" has no alternative for parameter value ${selector}`
        );
      }
      for (const inner of alternative) {
        emitSymbol(inner, children, tokens, tree);
      }
      return;
    }
  }
}
