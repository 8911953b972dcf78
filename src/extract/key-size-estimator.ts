import { isUniversal } from "../common/index.js";
import { UniversalTag } from "../common/types.js";
import type { Element } from "../common/types.js";
import { TreeWalker } from "../parser/tree-walker.js";
import type { WalkerOptions } from "../parser/tree-walker.js";

/**
 * Guess the key size of a signature block, in bits.
 *
 * Heuristic only: signed structures conventionally end with the signature
 * or key material, so when the last element of a depth-first walk is an
 * OCTET STRING its length is taken as the key size. Returns 0 otherwise.
 */
export function estimateKeySize(
  bytes: Uint8Array,
  options?: WalkerOptions,
): number {
  // single slot owned by this walk, overwritten on every visit
  const slot: { last?: Element } = {};
  new TreeWalker(options).walk(bytes, (element) => {
    slot.last = element;
  });
  const { last } = slot;
  if (last === undefined || !isUniversal(last, UniversalTag.OctetString)) {
    return 0;
  }
  return last.contentLength * 8;
}
