// tests/unit/extract/field-extractor.test.ts
import { describe, it } from "vitest";
import assert from "assert";
import {
  emptyValidation,
  extractFields,
  isValidSignature,
} from "../../../src/extract/index.js";
import { CertificateField } from "../../../src/common/types.js";
import type { ValidationResult } from "../../../src/common/types.js";
import {
  SAMPLE_SUBJECT,
  concat,
  ia5,
  int,
  oid,
  printable,
  rdn,
  seq,
  subjectName,
  tlv,
  utf8,
} from "../../helpers/der.js";

const CN = "2.5.4.3";
const C = "2.5.4.6";
const L = "2.5.4.7";
const O = "2.5.4.10";
const EMAIL = "1.2.840.113549.1.9.1";

describe("extractFields", () => {
  it("finds all five subject attributes of a Name", () => {
    const result = extractFields(subjectName());
    assert.deepStrictEqual(result, {
      commonName: { found: true, value: SAMPLE_SUBJECT.commonName },
      countryName: { found: true, value: SAMPLE_SUBJECT.countryName },
      localityName: { found: true, value: SAMPLE_SUBJECT.localityName },
      organizationName: { found: true, value: SAMPLE_SUBJECT.organizationName },
      emailAddress: { found: true, value: SAMPLE_SUBJECT.emailAddress },
    });
    assert.strictEqual(isValidSignature(result), true);
  });

  it("accepts attributes in any order and at any depth", () => {
    const bytes = seq(
      seq(seq(seq(oid(EMAIL), ia5("deep@example.com")))),
      oid(C),
      printable("DE"),
      seq(oid(O), utf8("Org")),
      rdn(L, utf8("Town")),
      seq(seq(oid(CN), utf8("Name"))),
    );
    const result = extractFields(bytes);
    assert.deepStrictEqual(result.emailAddress, { found: true, value: "deep@example.com" });
    assert.deepStrictEqual(result.countryName, { found: true, value: "DE" });
    assert.deepStrictEqual(result.organizationName, { found: true, value: "Org" });
    assert.deepStrictEqual(result.localityName, { found: true, value: "Town" });
    assert.deepStrictEqual(result.commonName, { found: true, value: "Name" });
    assert.strictEqual(isValidSignature(result), true);
  });

  it("keeps the last occurrence of a repeated attribute", () => {
    const result = extractFields(seq(rdn(CN, utf8("Issuer CA")), rdn(CN, utf8("Signer"))));
    assert.deepStrictEqual(result.commonName, { found: true, value: "Signer" });
  });

  it("reads only the next sibling, not a parent's sibling", () => {
    const result = extractFields(seq(seq(oid(CN)), utf8("Outside")));
    assert.deepStrictEqual(result.commonName, { found: false });
  });

  it("ignores a constructed or empty follower", () => {
    assert.deepStrictEqual(
      extractFields(seq(oid(CN), seq(utf8("Nested")))).commonName,
      { found: false },
    );
    assert.deepStrictEqual(extractFields(seq(oid(CN), utf8(""))).commonName, {
      found: false,
    });
  });

  it("ignores OID content under a non-universal tag", () => {
    const bytes = seq(tlv(0x86, [0x55, 0x04, 0x03]), utf8("Tagged"));
    assert.deepStrictEqual(extractFields(bytes).commonName, { found: false });
  });

  it("decodes BMPString values", () => {
    const bytes = rdn(CN, tlv(0x1e, [0x00, 0x41, 0x00, 0x42]));
    assert.deepStrictEqual(extractFields(bytes).commonName, { found: true, value: "AB" });
  });

  it("uses the bytes of a non-string follower as text", () => {
    const bytes = seq(oid(C), int(0x55, 0x53));
    assert.deepStrictEqual(extractFields(bytes).countryName, { found: true, value: "US" });
  });

  it("keeps fields found before a decode failure", () => {
    const bytes = concat(rdn(CN, utf8("Kept")), [0x30, 0x80]);
    const result = extractFields(bytes);
    assert.deepStrictEqual(result.commonName, { found: true, value: "Kept" });
    assert.deepStrictEqual(result.countryName, { found: false });
  });

  it("returns an empty result for data without attributes", () => {
    assert.deepStrictEqual(extractFields(seq(int(1))), emptyValidation());
    assert.deepStrictEqual(extractFields(new Uint8Array()), emptyValidation());
    assert.deepStrictEqual(extractFields(new Uint8Array([0xff, 0xff])), emptyValidation());
  });
});

describe("isValidSignature", () => {
  it("requires all five fields", () => {
    const partial: ValidationResult = {
      ...emptyValidation(),
      commonName: { found: true, value: "Test CA" },
    };
    assert.strictEqual(isValidSignature(partial), false);
    assert.strictEqual(isValidSignature(emptyValidation()), false);
  });

  it("treats each missing field as invalid", () => {
    const full = extractFields(subjectName());
    for (const key of Object.values(CertificateField)) {
      assert.strictEqual(isValidSignature({ ...full, [key]: { found: false } }), false);
    }
  });
});
