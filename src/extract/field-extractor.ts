import { decodeBmpString, decodeOID, decodeUtf8 } from "../common/codecs.js";
import { isUniversal } from "../common/index.js";
import { CERTIFICATE_FIELD_OIDS } from "../common/oid-table.js";
import { CertificateField, UniversalTag } from "../common/types.js";
import type {
  Element,
  FieldPresence,
  ValidationResult,
} from "../common/types.js";
import { TreeWalker } from "../parser/tree-walker.js";
import type { WalkerOptions } from "../parser/tree-walker.js";

const ABSENT: FieldPresence = { found: false };

export function emptyValidation(): ValidationResult {
  return {
    commonName: ABSENT,
    countryName: ABSENT,
    localityName: ABSENT,
    organizationName: ABSENT,
    emailAddress: ABSENT,
  };
}

export function isValidSignature(result: ValidationResult): boolean {
  return Object.values(CertificateField).every(
    (field) => result[field].found,
  );
}

function decodeAttributeValue(element: Element): string {
  if (isUniversal(element, UniversalTag.BMPString)) {
    return decodeBmpString(element.rawContent);
  }
  return decodeUtf8(element.rawContent);
}

/**
 * Collect the subject attributes a signer certificate is expected to carry.
 *
 * An attribute is the OBJECT IDENTIFIER of one of the five recognised types
 * followed, as the next sibling, by a non-empty primitive holding its value.
 * When a type occurs more than once, the last occurrence in document order
 * wins.
 */
export function extractFields(
  bytes: Uint8Array,
  options?: WalkerOptions,
): ValidationResult {
  const found: Partial<Record<CertificateField, FieldPresence>> = {};
  let pending: { field: CertificateField; depth: number } | undefined;

  new TreeWalker(options).walk(bytes, (element) => {
    // A primitive has no children, so the element visited right after it
    // at the same depth is its next sibling.
    if (
      pending !== undefined &&
      element.depth === pending.depth &&
      !element.constructed &&
      element.contentLength > 0
    ) {
      found[pending.field] = {
        found: true,
        value: decodeAttributeValue(element),
      };
    }
    pending = undefined;

    if (isUniversal(element, UniversalTag.ObjectIdentifier)) {
      const field = CERTIFICATE_FIELD_OIDS.get(decodeOID(element.rawContent));
      if (field !== undefined) {
        pending = { field, depth: element.depth };
      }
    }
  });

  return { ...emptyValidation(), ...found };
}
