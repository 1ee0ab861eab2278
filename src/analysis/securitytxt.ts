import {
  DAY_MS,
  KNOWN_FIELDS,
  MAX_RECOMMENDED_EXPIRY_DAYS,
  PGP_SIGNATURE_BEGIN,
  PGP_SIGNATURE_END,
  PGP_SIGNED_HEADER,
} from "./constants";
import type { FindingBuckets, SecurityTxtDocument, ValidationReport } from "./types";
import { createFindingBuckets, pushFinding } from "./utils";

export const MESSAGES = {
  no_security_txt: "security.txt could not be located.",
  location:
    "security.txt was located on the top-level path (legacy place), but must be placed under the '/.well-known/' path.",
  invalid_cert: "security.txt must be served with a valid TLS certificate.",
  no_content_type: "HTTP Content-Type header must be sent.",
  invalid_media: "Media type in Content-Type header must be 'text/plain'.",
  invalid_charset: "Charset parameter in Content-Type header must be 'utf-8' if present.",
  no_line_separators:
    "Every line, including the last one, must end with either a carriage return and line feed characters or just a line feed character.",
  signed_format_issue: "Signed security.txt must start with the header '-----BEGIN PGP SIGNED MESSAGE-----'.",
  data_after_sig: "Signed security.txt must not contain data after the signature.",
  invalid_line: "Line must contain a field name and value, unless the line is blank or contains a comment.",
  prec_ws: "There must be no whitespace before the field separator (colon).",
  no_space: "The field separator (colon) must be followed by a space.",
  empty_key: "Field name must not be empty.",
  empty_value: "Field value must not be empty.",
  no_uri: "Field value must be a URI.",
  no_https: "Web URI must begin with 'https://'.",
  no_contact: "'Contact' field must appear at least once.",
  no_expire: "'Expires' field must be present.",
  multi_expire: "'Expires' field must not appear more than once.",
  invalid_expiry: "Date and time in 'Expires' field must be formatted according to ISO 8601.",
  expired: "Date and time in 'Expires' field must not be in the past.",
  long_expiry: "Date and time in 'Expires' field should be less than a year into the future.",
  multi_lang: "'Preferred-Languages' field must not appear more than once.",
  invalid_lang:
    "Value in 'Preferred-Languages' field must match one or more language tags as defined in RFC5646, separated by commas.",
  no_canonical_match: "Web URI where security.txt is located must match with a 'Canonical' field.",
  no_canonical: "'Canonical' field should be present in a signed file.",
  no_encryption: "'Encryption' field should be present when 'Contact' field contains an email address.",
  not_signed: "security.txt should be digitally signed.",
} as const;

const URI_FIELDS = new Set(["acknowledgments", "canonical", "contact", "csaf", "encryption", "hiring", "policy"]);
const KNOWN_FIELD_SET = new Set<string>(KNOWN_FIELDS);

const RFC3339_PATTERN = /^\d{4}-\d{2}-\d{2}[Tt]\d{2}:\d{2}:\d{2}(\.\d+)?([Zz]|[+-]\d{2}:\d{2})$/;
const LANGUAGE_TAG_PATTERN = /^[a-z]{1,8}(-[a-z0-9]{1,8})*$/i;

export interface SecurityTxtField {
  name: string;
  value: string;
  line: number;
}

interface ContentLine {
  text: string;
  line: number;
}

const unknownFieldMessage = (name: string) =>
  `security.txt contains an unknown field. Field "${name}" is either a custom field which may not be widely ` +
  "supported, or there is a typo in a standardised field name.";

const checkContentType = (contentType: string | null, buckets: FindingBuckets) => {
  if (!contentType) {
    pushFinding(buckets, "errors", "no_content_type", MESSAGES.no_content_type);
    return;
  }

  const [media, ...params] = contentType.split(";").map((part) => part.trim().toLowerCase());
  if (media !== "text/plain") {
    pushFinding(buckets, "errors", "invalid_media", MESSAGES.invalid_media);
  }

  const charset = params.find((param) => param.startsWith("charset="));
  if (charset && charset.slice("charset=".length).replace(/"/g, "") !== "utf-8") {
    pushFinding(buckets, "errors", "invalid_charset", MESSAGES.invalid_charset);
  }
};

const splitLines = (body: string): ContentLine[] => {
  const raw = body.split(/\r?\n/);
  if (raw[raw.length - 1] === "") {
    raw.pop();
  }
  return raw.map((text, index) => ({ text, line: index + 1 }));
};

/**
 * Strips the OpenPGP cleartext framing from a signed file and returns the
 * signed lines. Framing problems are recorded as errors.
 */
const unwrapSigned = (lines: ContentLine[], buckets: FindingBuckets): ContentLine[] => {
  let cursor = 1;
  // Armor headers ("Hash: SHA256") end at the first blank line.
  while (cursor < lines.length && lines[cursor].text.trim() !== "") {
    cursor += 1;
  }
  cursor += 1;

  const signatureStart = lines.findIndex((entry, index) => index >= cursor && entry.text === PGP_SIGNATURE_BEGIN);
  if (signatureStart === -1) {
    pushFinding(buckets, "errors", "signed_format_issue", MESSAGES.signed_format_issue, lines[0].line);
    return lines.slice(cursor);
  }

  const signatureEnd = lines.findIndex((entry, index) => index > signatureStart && entry.text === PGP_SIGNATURE_END);
  if (signatureEnd === -1) {
    pushFinding(buckets, "errors", "signed_format_issue", MESSAGES.signed_format_issue, lines[signatureStart].line);
  } else {
    const trailing = lines.slice(signatureEnd + 1).find((entry) => entry.text.trim() !== "");
    if (trailing) {
      pushFinding(buckets, "errors", "data_after_sig", MESSAGES.data_after_sig, trailing.line);
    }
  }

  return lines.slice(cursor, signatureStart).map((entry) => ({
    ...entry,
    text: entry.text.startsWith("- ") ? entry.text.slice(2) : entry.text,
  }));
};

export const parseFields = (lines: ContentLine[], buckets: FindingBuckets): SecurityTxtField[] => {
  const fields: SecurityTxtField[] = [];

  lines.forEach(({ text, line }) => {
    if (!text.trim() || text.trimStart().startsWith("#")) {
      return;
    }

    const separator = text.indexOf(":");
    if (separator === -1) {
      pushFinding(buckets, "errors", "invalid_line", MESSAGES.invalid_line, line);
      return;
    }

    const key = text.slice(0, separator);
    const rest = text.slice(separator + 1);
    if (key !== key.trimEnd()) {
      pushFinding(buckets, "errors", "prec_ws", MESSAGES.prec_ws, line);
    }

    const name = key.trim();
    if (!name) {
      pushFinding(buckets, "errors", "empty_key", MESSAGES.empty_key, line);
      return;
    }

    const value = rest.trim();
    if (!value) {
      pushFinding(buckets, "errors", "empty_value", MESSAGES.empty_value, line);
      return;
    }

    if (!rest.startsWith(" ")) {
      pushFinding(buckets, "errors", "no_space", MESSAGES.no_space, line);
    }

    fields.push({ name: name.toLowerCase(), value, line });
  });

  return fields;
};

const checkUri = (field: SecurityTxtField, buckets: FindingBuckets) => {
  let uri: URL;
  try {
    uri = new URL(field.value);
  } catch {
    pushFinding(buckets, "errors", "no_uri", MESSAGES.no_uri, field.line);
    return;
  }
  if (uri.protocol === "http:") {
    pushFinding(buckets, "errors", "no_https", MESSAGES.no_https, field.line);
  }
};

const parseExpires = (field: SecurityTxtField, buckets: FindingBuckets, now: Date): Date | null => {
  const timestamp = RFC3339_PATTERN.test(field.value) ? Date.parse(field.value) : Number.NaN;
  if (Number.isNaN(timestamp)) {
    pushFinding(buckets, "errors", "invalid_expiry", MESSAGES.invalid_expiry, field.line);
    return null;
  }

  const expiresAt = new Date(timestamp);
  if (expiresAt.getTime() < now.getTime()) {
    pushFinding(buckets, "errors", "expired", MESSAGES.expired, field.line);
  } else if (expiresAt.getTime() - now.getTime() > MAX_RECOMMENDED_EXPIRY_DAYS * DAY_MS) {
    pushFinding(buckets, "recommendations", "long_expiry", MESSAGES.long_expiry, field.line);
  }
  return expiresAt;
};

/**
 * Applies the RFC 9116 rules to a downloaded security.txt.
 */
export function analyzeSecurityTxt(document: SecurityTxtDocument, now = new Date()): ValidationReport {
  const buckets = createFindingBuckets();

  if (document.invalidCert) {
    pushFinding(buckets, "errors", "invalid_cert", MESSAGES.invalid_cert);
  }
  if (document.legacyLocation) {
    pushFinding(buckets, "errors", "location", MESSAGES.location);
  }
  checkContentType(document.contentType, buckets);

  if (document.body.length > 0 && !/\r?\n$/.test(document.body)) {
    pushFinding(buckets, "errors", "no_line_separators", MESSAGES.no_line_separators);
  }

  const allLines = splitLines(document.body);
  const signed = allLines[0]?.text === PGP_SIGNED_HEADER;
  let contentLines = allLines;

  if (signed) {
    contentLines = unwrapSigned(allLines, buckets);
  } else {
    const misplacedHeader = allLines.find((entry) => entry.text === PGP_SIGNED_HEADER);
    if (misplacedHeader) {
      pushFinding(buckets, "errors", "signed_format_issue", MESSAGES.signed_format_issue, misplacedHeader.line);
    } else {
      pushFinding(buckets, "recommendations", "not_signed", MESSAGES.not_signed);
    }
  }

  const fields = parseFields(contentLines, buckets);
  const byName = (name: string) => fields.filter((field) => field.name === name);

  fields.forEach((field) => {
    if (!KNOWN_FIELD_SET.has(field.name)) {
      pushFinding(buckets, "notifications", "unknown_field", unknownFieldMessage(field.name), field.line);
      return;
    }
    if (URI_FIELDS.has(field.name)) {
      checkUri(field, buckets);
    }
  });

  const contacts = byName("contact");
  if (contacts.length === 0) {
    pushFinding(buckets, "errors", "no_contact", MESSAGES.no_contact);
  }

  let expiresAt: Date | null = null;
  const [expires, ...extraExpires] = byName("expires");
  if (!expires) {
    pushFinding(buckets, "errors", "no_expire", MESSAGES.no_expire);
  } else {
    expiresAt = parseExpires(expires, buckets, now);
    extraExpires.forEach((field) => pushFinding(buckets, "errors", "multi_expire", MESSAGES.multi_expire, field.line));
  }

  const [languages, ...extraLanguages] = byName("preferred-languages");
  if (languages) {
    const tags = languages.value.split(",").map((tag) => tag.trim());
    if (tags.some((tag) => !LANGUAGE_TAG_PATTERN.test(tag))) {
      pushFinding(buckets, "errors", "invalid_lang", MESSAGES.invalid_lang, languages.line);
    }
    extraLanguages.forEach((field) => pushFinding(buckets, "errors", "multi_lang", MESSAGES.multi_lang, field.line));
  }

  const canonicals = byName("canonical");
  if (canonicals.length > 0) {
    const locations = new Set([document.requestedUrl, document.finalUrl]);
    if (!canonicals.some((field) => locations.has(field.value))) {
      pushFinding(buckets, "errors", "no_canonical_match", MESSAGES.no_canonical_match);
    }
  } else if (signed) {
    pushFinding(buckets, "recommendations", "no_canonical", MESSAGES.no_canonical);
  }

  const hasEmailContact = contacts.some((field) => field.value.toLowerCase().startsWith("mailto:"));
  if (hasEmailContact && byName("encryption").length === 0) {
    pushFinding(buckets, "recommendations", "no_encryption", MESSAGES.no_encryption);
  }

  return {
    url: document.finalUrl,
    ...buckets,
    expiresAt,
  };
}
