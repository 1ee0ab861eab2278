import "../env";
import got, { RequestError, type Response } from "got";
import { LEGACY_PATH, REQUEST_TIMEOUT_MS, USER_AGENT, WELL_KNOWN_PATH } from "./constants";
import type { SecurityTxtDocument } from "./types";

const baseClient = got.extend({
  headers: {
    "User-Agent": USER_AGENT,
    Accept: "text/plain,*/*;q=0.8",
  },
  timeout: {
    request: REQUEST_TIMEOUT_MS,
  },
  retry: {
    limit: 1,
  },
});

export const httpClient = baseClient;

const TLS_ERROR_CODES = new Set([
  "CERT_HAS_EXPIRED",
  "CERT_NOT_YET_VALID",
  "DEPTH_ZERO_SELF_SIGNED_CERT",
  "ERR_TLS_CERT_ALTNAME_INVALID",
  "SELF_SIGNED_CERT_IN_CHAIN",
  "UNABLE_TO_GET_ISSUER_CERT_LOCALLY",
  "UNABLE_TO_VERIFY_LEAF_SIGNATURE",
]);

export const isCertificateError = (error: unknown): error is RequestError =>
  error instanceof RequestError && TLS_ERROR_CODES.has(error.code);

interface FetchOptions {
  signal?: AbortSignal;
}

interface LocationResponse {
  response: Response<string>;
  invalidCert: boolean;
}

async function requestLocation(url: string, signal?: AbortSignal): Promise<LocationResponse> {
  try {
    const response = await baseClient.get(url, { throwHttpErrors: false, signal });
    return { response, invalidCert: false };
  } catch (error) {
    if (!isCertificateError(error)) {
      throw error;
    }
    // Retry without verification so the content can still be reviewed.
    const response = await baseClient.get(url, {
      throwHttpErrors: false,
      signal,
      https: { rejectUnauthorized: false },
    });
    return { response, invalidCert: true };
  }
}

export class InvalidDomainError extends Error {
  constructor(readonly domain: string) {
    super(`"${domain}" is not a valid host name`);
    this.name = "InvalidDomainError";
  }
}

export const securityTxtUrls = (domain: string) => {
  let origin: URL;
  try {
    origin = new URL(`https://${domain}`);
  } catch {
    throw new InvalidDomainError(domain);
  }
  return {
    wellKnown: new URL(WELL_KNOWN_PATH, origin).toString(),
    legacy: new URL(LEGACY_PATH, origin).toString(),
  };
};

/**
 * Downloads the security.txt of `domain`, looking under /.well-known/ first and
 * falling back to the legacy top-level path. Resolves to null when neither
 * location answers with a 2xx status; transport failures reject.
 */
export async function fetchSecurityTxt(
  domain: string,
  { signal }: FetchOptions = {},
): Promise<SecurityTxtDocument | null> {
  const { wellKnown, legacy } = securityTxtUrls(domain);

  for (const requestedUrl of [wellKnown, legacy]) {
    const { response, invalidCert } = await requestLocation(requestedUrl, signal);
    if (response.statusCode < 200 || response.statusCode >= 300) {
      continue;
    }

    const contentType = response.headers["content-type"];
    return {
      domain,
      requestedUrl,
      finalUrl: response.url ?? requestedUrl,
      statusCode: response.statusCode,
      contentType: contentType ? String(contentType) : null,
      body: response.body ?? "",
      invalidCert,
      legacyLocation: requestedUrl === legacy,
    };
  }

  return null;
}
