import type { PgfErrorCode } from "../errors.js";

export type FlagValue = string | number;

export type Flags = ReadonlyMap<string, FlagValue>;

export interface FunctionSignature {
  /** Function identifier (case preserved). */
  readonly name: string;
  /** Argument categories in declaration order. */
  readonly args: readonly string[];
  /** Result category. */
  readonly result: string;
  /** Probability recorded by the grammar compiler. */
  readonly probability: number;
}

export interface AbstractSyntax {
  readonly name: string;
  readonly startCategory: string;
  readonly flags: Flags;
  /** Categories in declaration order. */
  readonly categories: readonly string[];
  /** Function table in declaration order. */
  readonly functions: ReadonlyMap<string, FunctionSignature>;
}

/** A token taken verbatim from the literal table. */
export interface LiteralSymbol {
  readonly kind: "literal";
  readonly index: number;
  readonly token: string;
}

/** Splices field `field` of the `argument`-th child. */
export interface ArgumentSymbol {
  readonly kind: "argument";
  readonly argument: number;
  readonly field: number;
}

/**
 * Selects one alternative by the value the `argument`-th child carries in its
 * parameter slot `parameter`.
 */
export interface ChoiceSymbol {
  readonly kind: "choice";
  readonly argument: number;
  readonly parameter: number;
  readonly alternatives: readonly (readonly SimpleSymbol[])[];
}

export type SimpleSymbol = LiteralSymbol | ArgumentSymbol;

export type PgfSymbol = SimpleSymbol | ChoiceSymbol;

export type Sequence = readonly PgfSymbol[];

export type ParameterValue =
  | { readonly kind: "constant"; readonly value: number }
  | { readonly kind: "inherit"; readonly argument: number; readonly slot: number };

export interface PmcfgRule {
  /** Category the rule builds; the function's result category. */
  readonly category: string;
  readonly function: string;
  /** Argument categories; always equal to the function's declared arguments. */
  readonly args: readonly string[];
  /** One sequence index per linearization field. */
  readonly fields: readonly number[];
  /** Parameter values this rule gives its category. */
  readonly parameters: readonly ParameterValue[];
}

export interface ConcreteSyntax {
  readonly language: string;
  readonly flags: Flags;
  readonly printNames: ReadonlyMap<string, string>;
  readonly literals: readonly string[];
  readonly sequences: readonly Sequence[];
  /** Category → rules, in declaration order. */
  readonly productions: ReadonlyMap<string, readonly PmcfgRule[]>;
  /** Function → rules, derived from {@link productions}. */
  readonly rulesByFunction: ReadonlyMap<string, readonly PmcfgRule[]>;
  /** Number of linearization fields of each category with productions. */
  readonly fieldCounts: ReadonlyMap<string, number>;
  /** Number of parameter slots of each category with productions. */
  readonly parameterCounts: ReadonlyMap<string, number>;
}

export interface DecodeDiagnostic {
  /** Zero-based position of the block among the declared concrete syntaxes. */
  readonly languageIndex: number;
  /** Language identifier, when it could be read before the failure. */
  readonly language?: string;
  /** Absolute byte offset of the failure. */
  readonly offset: number;
  readonly code: PgfErrorCode;
  readonly message: string;
}
