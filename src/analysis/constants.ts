const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;
const DEFAULT_DOMAIN_TIMEOUT_MS = 30_000;

const parsePositive = (raw: string | undefined, fallback: number) => {
  const parsed = Number(raw);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

export const REQUEST_TIMEOUT_MS = parsePositive(
  process.env.SECURITY_TXT_REQUEST_TIMEOUT_MS,
  DEFAULT_REQUEST_TIMEOUT_MS,
);

export const DOMAIN_TIMEOUT_MS = parsePositive(process.env.SECURITY_TXT_DOMAIN_TIMEOUT_MS, DEFAULT_DOMAIN_TIMEOUT_MS);

export const USER_AGENT = "security-txt-checker/0.1 (+https://www.rfc-editor.org/rfc/rfc9116)";

export const WELL_KNOWN_PATH = "/.well-known/security.txt";
export const LEGACY_PATH = "/security.txt";

export const DAY_MS = 24 * 60 * 60 * 1000;

// Expires values further out than this earn a recommendation.
export const MAX_RECOMMENDED_EXPIRY_DAYS = 366;

export const KNOWN_FIELDS = [
  "acknowledgments",
  "canonical",
  "contact",
  "encryption",
  "expires",
  "hiring",
  "policy",
  "preferred-languages",
  "csaf",
] as const;

export const PGP_SIGNED_HEADER = "-----BEGIN PGP SIGNED MESSAGE-----";
export const PGP_SIGNATURE_BEGIN = "-----BEGIN PGP SIGNATURE-----";
export const PGP_SIGNATURE_END = "-----END PGP SIGNATURE-----";
