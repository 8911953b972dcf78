import type { Logger } from "winston";

import { LocatorError, LocatorErrorCode } from "../common/errors.js";
import type { SignatureMatch } from "../common/types.js";
import { extractFields, isValidSignature } from "../extract/field-extractor.js";
import { logger as defaultLogger } from "../logger.js";
import { decodeElement } from "../parser/tag-decoder.js";
import type { WalkerOptions } from "../parser/tree-walker.js";

/** SEQUENCE followed by a long-form length of two octets. */
export const SIGNATURE_MARKER: readonly [number, number] = [0x30, 0x82];

export interface LocatorOptions extends WalkerOptions {
  logger?: Logger;
}

/**
 * Backward search for a signer structure appended to a file.
 *
 * Every `30 82` pair, from the end of the buffer towards the start, is a
 * candidate. A candidate is accepted when it decodes as one element and its
 * content carries all five subject attributes; anything else sends the
 * search on to the next pair. The rightmost acceptable candidate wins, which
 * is a heuristic: a buffer holding several plausible blocks yields the one
 * closest to its end.
 */
export class SignatureLocator {
  private readonly walkerOptions: WalkerOptions;
  private readonly logger: Logger;

  public constructor(options?: LocatorOptions) {
    this.walkerOptions = {
      maxDepth: options?.maxDepth,
      maxElementsPerLevel: options?.maxElementsPerLevel,
    };
    this.logger = options?.logger ?? defaultLogger;
  }

  /**
   * @returns The accepted structure, or null once every candidate failed.
   */
  public find(buffer: Uint8Array): SignatureMatch | null {
    return this.scan(buffer).match;
  }

  /**
   * @throws LocatorError with code NoSignatureFound when no candidate passes.
   */
  public locate(buffer: Uint8Array): SignatureMatch {
    const { match, candidates } = this.scan(buffer);
    if (match === null) {
      throw new LocatorError(
        LocatorErrorCode.NoSignatureFound,
        "no valid signature found",
        candidates,
      );
    }
    return match;
  }

  private scan(buffer: Uint8Array): {
    match: SignatureMatch | null;
    candidates: number;
  } {
    let candidates = 0;
    for (let i = buffer.length - 2; i >= 0; i--) {
      if (buffer[i] !== SIGNATURE_MARKER[0] || buffer[i + 1] !== SIGNATURE_MARKER[1]) {
        continue;
      }
      candidates++;
      const match = this.tryCandidate(buffer, i);
      if (match !== null) {
        this.logger.log(
          "debug",
          `Accepted candidate at offset ${i} (${match.fullBytes.length} bytes) after ${candidates} candidate(s)`,
        );
        return { match, candidates };
      }
    }
    this.logger.log(
      "debug",
      `No acceptable structure among ${candidates} candidate(s) in ${buffer.length} bytes`,
    );
    return { match: null, candidates };
  }

  private tryCandidate(buffer: Uint8Array, offset: number): SignatureMatch | null {
    const decoded = decodeElement(buffer.subarray(offset), 0, offset);
    if (!decoded.ok) {
      this.logger.log(
        "debug",
        `Candidate at offset ${offset} rejected: ${decoded.error.code}`,
      );
      return null;
    }

    const { element, consumed } = decoded.value;
    const fullBytes = buffer.subarray(offset, offset + consumed);
    const validation = extractFields(fullBytes, this.walkerOptions);
    if (!isValidSignature(validation)) {
      this.logger.log(
        "debug",
        `Candidate at offset ${offset} rejected: missing subject attributes`,
      );
      return null;
    }

    return Object.freeze({ offset, fullBytes, element, validation });
  }
}

export function locateSignature(
  buffer: Uint8Array,
  options?: LocatorOptions,
): SignatureMatch {
  return new SignatureLocator(options).locate(buffer);
}

export function findSignature(
  buffer: Uint8Array,
  options?: LocatorOptions,
): SignatureMatch | null {
  return new SignatureLocator(options).find(buffer);
}
