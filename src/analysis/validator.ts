import { fetchSecurityTxt } from "./http";
import { analyzeSecurityTxt, MESSAGES } from "./securitytxt";
import type { DomainValidator, SecurityTxtDocument, ValidateOptions } from "./types";

export type SecurityTxtFetcher = (
  domain: string,
  options?: Pick<ValidateOptions, "signal">,
) => Promise<SecurityTxtDocument | null>;

export const createValidator =
  (fetchDocument: SecurityTxtFetcher = fetchSecurityTxt): DomainValidator =>
  async (domain, { signal, now } = {}) => {
    const document = await fetchDocument(domain, { signal });
    if (!document) {
      return {
        url: null,
        errors: [{ code: "no_security_txt", message: MESSAGES.no_security_txt, line: null }],
        recommendations: [],
        notifications: [],
        expiresAt: null,
      };
    }
    return analyzeSecurityTxt(document, now);
  };

export const validateDomain = createValidator();
