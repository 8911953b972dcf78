import { readFileSync } from "node:fs";

import { CertificateField } from "./types.js";

export const OID_COMMON_NAME = "2.5.4.3";
export const OID_COUNTRY_NAME = "2.5.4.6";
export const OID_LOCALITY_NAME = "2.5.4.7";
export const OID_ORGANIZATION_NAME = "2.5.4.10";
export const OID_EMAIL_ADDRESS = "1.2.840.113549.1.9.1";

/** Subject attributes a signer certificate must carry. */
export const CERTIFICATE_FIELD_OIDS: ReadonlyMap<string, CertificateField> =
  new Map([
    [OID_COMMON_NAME, CertificateField.CommonName],
    [OID_COUNTRY_NAME, CertificateField.CountryName],
    [OID_LOCALITY_NAME, CertificateField.LocalityName],
    [OID_ORGANIZATION_NAME, CertificateField.OrganizationName],
    [OID_EMAIL_ADDRESS, CertificateField.EmailAddress],
  ]);

// data/ sits two levels above both src/common and dist/common
const OID_TABLE_URL = new URL("../../data/oids.json", import.meta.url);

let table: ReadonlyMap<string, string> | undefined;

function parseTable(json: string): Map<string, string> {
  const parsed: unknown = JSON.parse(json);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(`OID table at ${OID_TABLE_URL.pathname} is not an object`);
  }
  const out = new Map<string, string>();
  for (const [oid, name] of Object.entries(parsed)) {
    if (typeof name !== "string") {
      throw new Error(`OID table entry '${oid}' has a non-string name`);
    }
    out.set(oid, name);
  }
  return out;
}

function loadTable(): ReadonlyMap<string, string> {
  table ??= parseTable(readFileSync(OID_TABLE_URL, "utf-8"));
  return table;
}

export function oidName(oid: string): string | undefined {
  return loadTable().get(oid);
}

function compareArcs(a: string, b: string): number {
  const pa = a.split(".").map(Number);
  const pb = b.split(".").map(Number);
  const len = Math.min(pa.length, pb.length);
  for (let i = 0; i < len; i++) {
    if (pa[i] !== pb[i]) return pa[i] - pb[i];
  }
  return pa.length - pb.length;
}

/** All known OIDs with their names, ordered arc by arc. */
export function listOids(): Array<[oid: string, name: string]> {
  return [...loadTable().entries()].sort(([a], [b]) => compareArcs(a, b));
}
