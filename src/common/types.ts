export const TagClass = {
  Universal: 0,
  Application: 1,
  ContextSpecific: 2,
  Private: 3,
} as const;
export type TagClass = (typeof TagClass)[keyof typeof TagClass];

export const UniversalTag = {
  Boolean: 1,
  Integer: 2,
  BitString: 3,
  OctetString: 4,
  Null: 5,
  ObjectIdentifier: 6,
  ObjectDescriptor: 7,
  External: 8,
  Real: 9,
  Enumerated: 10,
  EmbeddedPdv: 11,
  UTF8String: 12,
  RelativeOid: 13,
  Sequence: 16,
  Set: 17,
  NumericString: 18,
  PrintableString: 19,
  T61String: 20,
  VideotexString: 21,
  IA5String: 22,
  UTCTime: 23,
  GeneralizedTime: 24,
  GraphicString: 25,
  VisibleString: 26,
  GeneralString: 27,
  UniversalString: 28,
  BMPString: 30,
} as const;
export type UniversalTag = (typeof UniversalTag)[keyof typeof UniversalTag];

export interface TagInfo {
  tagClass: TagClass;
  constructed: boolean;
  tagNumber: number;
}

/**
 * One decoded TLV unit.
 *
 * `rawContent` is a view over the caller's buffer, never a copy, and always
 * holds exactly `contentLength` bytes.
 */
export interface Element extends TagInfo {
  /** Nesting level; top-level elements are at depth 0. */
  depth: number;
  /** Absolute position of the identifier octet in the scanned buffer. */
  offset: number;
  headerLength: number;
  contentLength: number;
  rawContent: Uint8Array;
}

export interface DecodedElement {
  element: Element;
  /** `headerLength + contentLength` */
  consumed: number;
}

export const CertificateField = {
  CommonName: "commonName",
  CountryName: "countryName",
  LocalityName: "localityName",
  OrganizationName: "organizationName",
  EmailAddress: "emailAddress",
} as const;
export type CertificateField =
  (typeof CertificateField)[keyof typeof CertificateField];

export type FieldPresence =
  | { readonly found: false }
  | { readonly found: true; readonly value: string };

export type ValidationResult = {
  readonly [F in CertificateField]: FieldPresence;
};

export interface SignatureMatch {
  /** Start of the structure in the scanned buffer. */
  readonly offset: number;
  /** Header and content of the structure, viewed over the scanned buffer. */
  readonly fullBytes: Uint8Array;
  readonly element: Element;
  readonly validation: ValidationResult;
}
