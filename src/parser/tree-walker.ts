import { DecodeErrorCode, TLVDecodeError } from "../common/errors.js";
import type { DecodedElement, Element } from "../common/types.js";
import { TagDecoder } from "./tag-decoder.js";

export const DEFAULT_MAX_DEPTH = 50;
export const DEFAULT_MAX_ELEMENTS_PER_LEVEL = 10000;

export interface WalkerOptions {
  /** Deepest nesting level whose region is decoded. */
  maxDepth?: number;
  /** Most elements decoded from a single region. */
  maxElementsPerLevel?: number;
}

/** Called once per decoded element, before its children. */
export type ElementVisitor = (element: Element) => void;

/** Where a region stopped decoding: the whole region and its position. */
export interface RegionFailure {
  error: TLVDecodeError;
  region: Uint8Array;
  regionOffset: number;
  depth: number;
}

export interface WalkOptions {
  depth?: number;
  baseOffset?: number;
  /** Called when a region stops early, at the point it stops. */
  onIssue?: (failure: RegionFailure) => void;
}

export interface WalkReport {
  /** Elements handed to the visitor. */
  visited: number;
  /** One entry per region whose decoding stopped early. */
  issues: TLVDecodeError[];
}

/**
 * Depth-first, document-order decoder over a byte region.
 *
 * Failures never escape a walk: each one ends decoding of the region it
 * occurred in and is listed in the report, while the enclosing region goes
 * on with its next element.
 */
export class TreeWalker {
  public readonly maxDepth: number;
  public readonly maxElementsPerLevel: number;

  public constructor(options?: WalkerOptions) {
    this.maxDepth = options?.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.maxElementsPerLevel =
      options?.maxElementsPerLevel ?? DEFAULT_MAX_ELEMENTS_PER_LEVEL;
  }

  public walk(
    bytes: Uint8Array,
    visitor: ElementVisitor,
    options?: WalkOptions,
  ): WalkReport {
    const report: WalkReport = { visited: 0, issues: [] };
    const fail = (failure: RegionFailure): void => {
      report.issues.push(failure.error);
      options?.onIssue?.(failure);
    };
    this.walkRegion(
      bytes,
      options?.depth ?? 0,
      options?.baseOffset ?? 0,
      visitor,
      fail,
      report,
    );
    return report;
  }

  /** Decode a region into a flat, document-ordered element list. */
  public collect(
    bytes: Uint8Array,
    baseOffset = 0,
  ): { elements: Element[]; issues: TLVDecodeError[] } {
    const elements: Element[] = [];
    const { issues } = this.walk(bytes, (el) => elements.push(el), {
      baseOffset,
    });
    return { elements, issues };
  }

  private walkRegion(
    region: Uint8Array,
    depth: number,
    baseOffset: number,
    visitor: ElementVisitor,
    fail: (failure: RegionFailure) => void,
    report: WalkReport,
  ): void {
    const stop = (error: TLVDecodeError): void =>
      fail({ error, region, regionOffset: baseOffset, depth });

    if (depth > this.maxDepth) {
      stop(
        new TLVDecodeError(
          DecodeErrorCode.RecursionLimitExceeded,
          `Nesting depth ${depth} at offset ${baseOffset} exceeds the limit of ${this.maxDepth}`,
          { offset: baseOffset, depth },
        ),
      );
      return;
    }

    let position = 0;
    let count = 0;
    while (position < region.length) {
      if (count >= this.maxElementsPerLevel) {
        stop(
          new TLVDecodeError(
            DecodeErrorCode.TooManyElements,
            `Region at offset ${baseOffset} holds more than ${this.maxElementsPerLevel} elements`,
            { offset: baseOffset + position, depth },
          ),
        );
        return;
      }

      let decoded: DecodedElement;
      try {
        decoded = TagDecoder.decode(
          region.subarray(position),
          depth,
          baseOffset + position,
        );
      } catch (e) {
        if (e instanceof TLVDecodeError) {
          stop(e);
          return;
        }
        throw e;
      }

      const { element, consumed } = decoded;
      visitor(element);
      report.visited++;
      count++;

      // rawContent is already bounded by the decoder to this region
      if (element.constructed && element.contentLength > 0) {
        this.walkRegion(
          element.rawContent,
          depth + 1,
          element.offset + element.headerLength,
          visitor,
          fail,
          report,
        );
      }

      position += consumed;
    }
  }
}
