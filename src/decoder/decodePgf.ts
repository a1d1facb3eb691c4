import { PgfDecodeError, PgfErrorCode } from "../errors.js";
import { ByteCursor } from "../binary/cursor.js";
import type { PgfFormatVersion } from "../binary/profile.js";
import { Grammar } from "../grammar/grammar.js";
import type { AbstractSyntax, ConcreteSyntax, DecodeDiagnostic } from "../grammar/types.js";
import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";
import { decodeAbstractSyntax } from "./abstractSyntax.js";
import { decodeConcreteSyntax } from "./concreteSyntax.js";
import { HEADER_SIZE, decodeHeader } from "./header.js";

export interface DecodeOptions {
  readonly logger?: Logger;
  /** Smallest plausible encoded list element, in bytes (default 1). */
  readonly minElementSize?: number;
}

export interface DecodeResult {
  readonly grammar: Grammar;
  /** One entry per language block that was discarded. */
  readonly diagnostics: DecodeDiagnostic[];
  readonly version: PgfFormatVersion;
}

/**
 * Decodes a PGF buffer.
 *
 * Header and abstract syntax failures throw {@link PgfDecodeError}. A failure
 * inside one language block discards only that block: the next block is
 * located from the outer framing and the failure is returned as a diagnostic.
 */
export function decodePgf(bytes: Uint8Array, options: DecodeOptions = {}): DecodeResult {
  const logger = options.logger ?? silentLogger;
  const header = decodeHeader(bytes);
  const cursor = new ByteCursor(bytes, header.profile, {
    start: HEADER_SIZE,
    minElementSize: options.minElementSize,
  });
  logger.debug("Decoding PGF", { version: header.profile.version, bytes: bytes.length });

  const abstract = decodeAbstractSyntax(cursor);
  const { concretes, diagnostics } = decodeConcretes(cursor, abstract, logger);

  if (!cursor.atEnd) {
    logger.warn("Ignoring trailing bytes after the last language block", {
      offset: cursor.offset,
      bytes: cursor.remaining,
    });
  }

  logger.info("Decoded grammar", {
    name: abstract.name,
    languages: [...concretes.keys()],
    discarded: diagnostics.length,
  });

  return {
    grammar: new Grammar(abstract, concretes),
    diagnostics,
    version: header.profile.version,
  };
}

interface ConcreteAccumulator {
  readonly concretes: Map<string, ConcreteSyntax>;
  readonly diagnostics: DecodeDiagnostic[];
}

function decodeConcretes(
  cursor: ByteCursor,
  abstract: AbstractSyntax,
  logger: Logger
): ConcreteAccumulator {
  const accumulator: ConcreteAccumulator = { concretes: new Map(), diagnostics: [] };
  const declared = cursor.readCount();

  for (let index = 0; index < declared; index += 1) {
    let block: ByteCursor;
    try {
      block = cursor.slice(cursor.readLength());
    } catch (error) {
      if (!(error instanceof PgfDecodeError)) {
        throw error;
      }
      // Without a trustworthy frame no later block can be located either.
      for (let skipped = index; skipped < declared; skipped += 1) {
        record(accumulator, logger, {
          languageIndex: skipped,
          offset: error.offset,
          code: error.code,
          message:
            skipped === index
              ? `Block frame is unreadable: ${error.message}`
              : `Block not reached: frame of block ${index} is unreadable`,
        });
      }
      break;
    }

    const blockStart = block.offset;
    const seen: { language?: string } = {};
    try {
      const concrete = decodeConcreteSyntax(block, abstract, (name) => {
        seen.language = name;
      });
      if (accumulator.concretes.has(concrete.language)) {
        throw new PgfDecodeError(
          PgfErrorCode.MalformedConcreteSyntax,
          `Duplicate language "${concrete.language}"`,
          blockStart
        );
      }
      accumulator.concretes.set(concrete.language, concrete);
      logger.debug("Decoded language block", { index, language: concrete.language });
    } catch (error) {
      if (!(error instanceof PgfDecodeError)) {
        throw error;
      }
      record(accumulator, logger, {
        languageIndex: index,
        ...(seen.language === undefined ? {} : { language: seen.language }),
        offset: error.offset,
        code: error.code,
        message: error.message,
      });
    }
  }

  return accumulator;
}

function record(
  accumulator: ConcreteAccumulator,
  logger: Logger,
  diagnostic: DecodeDiagnostic
): void {
  accumulator.diagnostics.push(diagnostic);
  logger.warn("Discarded language block", { ...diagnostic });
}
