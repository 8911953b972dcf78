import {
  decodeBitStringHex,
  decodeBmpString,
  decodeOID,
  decodeSignedInteger,
  decodeUtf8,
  toHex,
} from "../common/codecs.js";
import { oidName } from "../common/oid-table.js";
import { TagClass, UniversalTag } from "../common/types.js";

/** Bytes shown before hex output is cut short. */
export const HEX_PREVIEW_BYTES = 32;

const PRIMITIVE_NAMES: Readonly<Record<number, string>> = {
  [UniversalTag.Boolean]: "BOOLEAN",
  [UniversalTag.Integer]: "INTEGER",
  [UniversalTag.BitString]: "BIT STRING",
  [UniversalTag.OctetString]: "OCTET STRING",
  [UniversalTag.Null]: "NULL",
  [UniversalTag.ObjectIdentifier]: "OBJECT IDENTIFIER",
  [UniversalTag.ObjectDescriptor]: "ObjectDescriptor",
  [UniversalTag.Real]: "REAL",
  [UniversalTag.Enumerated]: "ENUMERATED",
  [UniversalTag.UTF8String]: "UTF8String",
  [UniversalTag.RelativeOid]: "RELATIVE-OID",
  [UniversalTag.NumericString]: "NumericString",
  [UniversalTag.PrintableString]: "PrintableString",
  [UniversalTag.T61String]: "T61String",
  [UniversalTag.VideotexString]: "VideotexString",
  [UniversalTag.IA5String]: "IA5String",
  [UniversalTag.UTCTime]: "UTCTime",
  [UniversalTag.GeneralizedTime]: "GeneralizedTime",
  [UniversalTag.GraphicString]: "GraphicString",
  [UniversalTag.VisibleString]: "VisibleString",
  [UniversalTag.GeneralString]: "GeneralString",
  [UniversalTag.UniversalString]: "UniversalString",
  [UniversalTag.BMPString]: "BMPString",
};

// Where context-specific tags usually show up inside a certificate.
const CONTEXT_HINTS: Readonly<Record<number, string>> = {
  0: "version/keyUsage",
  1: "issuerUniqueID/subjectAltName",
  2: "subjectUniqueID/extensions",
  3: "extensions",
};

const TEXT_TAGS: ReadonlySet<number> = new Set<number>([
  UniversalTag.UTF8String,
  UniversalTag.NumericString,
  UniversalTag.PrintableString,
  UniversalTag.T61String,
  UniversalTag.IA5String,
  UniversalTag.VisibleString,
  UniversalTag.UTCTime,
  UniversalTag.GeneralizedTime,
]);

export function tagName(
  tagNumber: number,
  tagClass: TagClass,
  constructed: boolean,
): string {
  switch (tagClass) {
    case TagClass.Application:
      return `APPLICATION [${tagNumber}]`;
    case TagClass.ContextSpecific: {
      const hint = CONTEXT_HINTS[tagNumber];
      return hint === undefined
        ? `CONTEXT [${tagNumber}]`
        : `CONTEXT [${tagNumber}] (${hint})`;
    }
    case TagClass.Private:
      return `PRIVATE [${tagNumber}]`;
  }

  if (constructed) {
    if (tagNumber === UniversalTag.Sequence) return "SEQUENCE";
    if (tagNumber === UniversalTag.Set) return "SET";
    return `CONSTRUCTED [${tagNumber}]`;
  }
  return PRIMITIVE_NAMES[tagNumber] ?? `PRIMITIVE [${tagNumber}]`;
}

/** Hex, cut to the first 32 bytes with the full size appended. */
export function formatHexPreview(content: Uint8Array): string {
  if (content.length > HEX_PREVIEW_BYTES) {
    return `${toHex(content.subarray(0, HEX_PREVIEW_BYTES))}... (${content.length} bytes)`;
  }
  return toHex(content);
}

/**
 * Render the content octets of a universal primitive for display.
 */
export function formatContent(tagNumber: number, content: Uint8Array): string {
  switch (tagNumber) {
    case UniversalTag.Boolean:
      if (content.length === 1) {
        return content[0] === 0 ? "FALSE" : "TRUE";
      }
      return toHex(content);

    case UniversalTag.Integer:
      if (content.length <= 8) {
        return `${decodeSignedInteger(content)} (0x${toHex(content, true)})`;
      }
      return toHex(content);

    case UniversalTag.Enumerated:
      return `ENUM(${decodeSignedInteger(content)})`;

    case UniversalTag.BitString: {
      if (content.length === 0) return "";
      const { unusedBits } = decodeBitStringHex(content);
      return `unused bits: ${unusedBits}, data: ${formatHexPreview(content.subarray(1))}`;
    }

    case UniversalTag.Null:
      return "";

    case UniversalTag.ObjectIdentifier: {
      const oid = decodeOID(content);
      const name = oidName(oid);
      return name === undefined ? oid : `${oid} (${name})`;
    }

    case UniversalTag.BMPString:
      return JSON.stringify(decodeBmpString(content));

    default:
      if (TEXT_TAGS.has(tagNumber)) {
        return JSON.stringify(decodeUtf8(content));
      }
      return formatHexPreview(content);
  }
}
