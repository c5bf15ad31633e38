/**
 * DOI normalization
 */

const DOI_SCHEME = /^doi:\s*/;
const URL_HOST = /^https?:\/\/[^/]+\/?/;
const EMBEDDED_DOI = /(?:^|\/)10\./;
const BARE_DOI = /^10\.[^\s/]+\/\S+$/;

export interface NormalizedDoi {
  /** Lowercased DOI with any resolver or proxy prefix removed. */
  value: string;
  /** True when the result has the bare `10.<registrant>/<suffix>` form. */
  valid: boolean;
}

/**
 * Lowercase a DOI and strip `doi:` or a leading resolver/proxy URL, e.g.
 * "https://dx.doi.org/10.1000/ABC" or "https://doi-org.proxy.example.edu/10.1000/abc".
 */
export function normalizeDoi(raw: string): NormalizedDoi {
  let doi = raw.trim().toLowerCase().replace(DOI_SCHEME, "");

  if (URL_HOST.test(doi)) {
    const path = doi.replace(URL_HOST, "");
    const match = EMBEDDED_DOI.exec(path);
    doi = match ? path.slice(match.index + (match[0].startsWith("/") ? 1 : 0)) : path;
  }

  return { value: doi, valid: BARE_DOI.test(doi) };
}
