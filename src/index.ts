export { decodePgf } from "./decoder/decodePgf.js";
export type { DecodeOptions, DecodeResult } from "./decoder/decodePgf.js";
export { encodePgf } from "./encoder/encodePgf.js";
export type { EncodeOptions } from "./encoder/encodePgf.js";
export { Grammar } from "./grammar/grammar.js";
export type { ParseOptions } from "./grammar/grammar.js";
export type {
  AbstractSyntax,
  ArgumentSymbol,
  ChoiceSymbol,
  ConcreteSyntax,
  DecodeDiagnostic,
  FlagValue,
  Flags,
  FunctionSignature,
  LiteralSymbol,
  ParameterValue,
  PgfSymbol,
  PmcfgRule,
  Sequence,
  SimpleSymbol,
} from "./grammar/types.js";
export { ByteCursor } from "./binary/cursor.js";
export type { ByteCursorOptions, ElementReader } from "./binary/cursor.js";
export { ByteWriter } from "./binary/writer.js";
export type { ElementWriter } from "./binary/writer.js";
export { PROFILE_1_0, PROFILE_2_1, profileForHeader, profileForVersion } from "./binary/profile.js";
export type { FormatProfile, PgfFormatVersion } from "./binary/profile.js";
export { PgfDecodeError, PgfError, PgfErrorCode } from "./errors.js";
export type { PgfFailure, PgfQueryError, PgfResult, PgfSuccess } from "./result.js";
export { mkTree, readTree, showTree, treeKey, treesEqual, uniqueTrees } from "./runtime/tree.js";
export type { AbstractSyntaxTree } from "./runtime/tree.js";
export { whitespaceTokenizer } from "./runtime/tokenize.js";
export type { Tokenizer } from "./runtime/tokenize.js";
export { linearizeFields, linearizeTree } from "./runtime/linearizer.js";
export type { Linearization } from "./runtime/linearizer.js";
export { parseTokens } from "./runtime/parser.js";
export type { ChartParseOptions, ChartParseResult, FieldSpans, Span } from "./runtime/parser.js";
export { checkTree } from "./runtime/typeCheck.js";
export { grammarToJson } from "./json/grammarJson.js";
export type { JsonObject, JsonValue } from "./json/grammarJson.js";
export { ConsoleLogger, createLogger, silentLogger } from "./logging/logger.js";
export type { LogContext, LogLevel, Logger } from "./logging/logger.js";
