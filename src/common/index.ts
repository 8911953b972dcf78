import { TagClass, UniversalTag } from "./types.js";
import type { TagInfo } from "./types.js";
export * from "./codecs.js";
export * from "./errors.js";
export * from "./oid-table.js";
export * from "./types.js";

export function isUniversal(
  tag: TagInfo,
  tagNumber: UniversalTag,
  constructed = false,
): boolean {
  return (
    tag.tagClass === TagClass.Universal &&
    tag.tagNumber === tagNumber &&
    tag.constructed === constructed
  );
}
