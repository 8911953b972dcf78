import { isValidSignature } from "../extract/field-extractor.js";
import { CertificateField } from "../common/types.js";
import type { ValidationResult } from "../common/types.js";

export const RULE = "========================================";

const FIELD_LABELS: Readonly<Record<CertificateField, string>> = {
  [CertificateField.CommonName]: "Common Name",
  [CertificateField.CountryName]: "Country Name",
  [CertificateField.LocalityName]: "Locality Name",
  [CertificateField.OrganizationName]: "Organization Name",
  [CertificateField.EmailAddress]: "Email Address",
};

export function renderValidation(result: ValidationResult): string[] {
  const lines = ["Signature Validation:"];
  for (const field of Object.values(CertificateField)) {
    const presence = result[field];
    const label = `  ${FIELD_LABELS[field]}: ${presence.found}`;
    lines.push(
      presence.found && presence.value !== ""
        ? `${label} (${presence.value})`
        : label,
    );
  }
  lines.push(
    isValidSignature(result)
      ? "✓ Valid signature - all required fields present"
      : "✗ Invalid signature - missing required fields",
  );
  return lines;
}

export function renderKeySize(bits: number): string {
  return bits > 0
    ? `Key size calculation: ${bits} bits`
    : "Key size calculation: N/A (no OCTET STRING found as final element)";
}
