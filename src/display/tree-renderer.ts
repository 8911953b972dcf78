import { toHex } from "../common/codecs.js";
import type { TLVDecodeError } from "../common/errors.js";
import { TagClass } from "../common/types.js";
import type { Element } from "../common/types.js";
import {
  formatContent,
  formatHexPreview,
  tagName,
} from "../format/content-formatter.js";
import { TreeWalker } from "../parser/tree-walker.js";
import type { WalkerOptions } from "../parser/tree-walker.js";

export interface RenderedTree {
  lines: string[];
  /** Set when the outermost region could not be decoded to its end. */
  error?: TLVDecodeError;
}

export function describeContent(element: Element): string {
  if (element.constructed || element.contentLength === 0) return "";
  if (element.tagClass === TagClass.Universal) {
    return formatContent(element.tagNumber, element.rawContent);
  }
  return formatHexPreview(element.rawContent);
}

/** One `asn1parse`-style line, e.g. `      0:d=0 hl=2 l=3 cons: SEQUENCE`. */
export function renderElement(element: Element): string {
  const offset = `${element.offset}:`.padStart(8);
  const kind = element.constructed ? "cons" : "prim";
  const name = tagName(element.tagNumber, element.tagClass, element.constructed);
  const line = `${offset}d=${element.depth} hl=${element.headerLength} l=${element.contentLength} ${kind}: ${name}`;
  const content = describeContent(element);
  return content === "" ? line : `${line}  ${content}`;
}

/**
 * Render every element of `bytes` in document order. A nested region that
 * fails to decode is shown as a hex dump at its own depth.
 */
export function renderTree(
  bytes: Uint8Array,
  baseOffset = 0,
  options?: WalkerOptions,
): RenderedTree {
  const rendered: RenderedTree = { lines: [] };
  const { lines } = rendered;

  new TreeWalker(options).walk(bytes, (el) => lines.push(renderElement(el)), {
    baseOffset,
    onIssue: (failure) => {
      if (failure.depth === 0) {
        rendered.error = failure.error;
        return;
      }
      lines.push(
        `${"  ".repeat(failure.depth)}[HEX DUMP]: ${toHex(failure.region)}`,
      );
    },
  });

  return rendered;
}
