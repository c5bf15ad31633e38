import { request, type Dispatcher } from "undici";
import { config } from "../config/index.js";
import { JournalLookupError } from "../utils/errors.js";

export interface AbbreviationClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  /** undici dispatcher, e.g. a MockAgent in tests */
  dispatcher?: Dispatcher;
}

/**
 * Fetches one abbreviation from the ISO 4 abbreviation service.
 * The service answers a GET on `<baseUrl><url-encoded title>` with the
 * abbreviation as plain text.
 */
export type AbbreviationFetcher = (journal: string) => Promise<string>;

export function abbreviationUrl(baseUrl: string, journal: string): string {
  const base = baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
  return `${base}${encodeURIComponent(journal)}`;
}

/**
 * Look up the ISO 4 abbreviation of a journal title.
 *
 * Single attempt, no retries.
 *
 * @throws JournalLookupError on a non-200 status, an empty answer, a
 * timeout or a transport failure
 */
export async function fetchAbbreviation(
  journal: string,
  options: AbbreviationClientOptions = {}
): Promise<string> {
  const baseUrl = options.baseUrl ?? config.abbreviation.baseUrl;
  const timeoutMs = options.timeoutMs ?? config.abbreviation.timeoutMs;

  let statusCode: number;
  let text: string;
  try {
    const res = await request(abbreviationUrl(baseUrl, journal), {
      method: "GET",
      headers: { accept: "text/plain" },
      headersTimeout: timeoutMs,
      bodyTimeout: timeoutMs,
      dispatcher: options.dispatcher,
    });
    statusCode = res.statusCode;
    text = await res.body.text();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new JournalLookupError(journal, `abbreviation service unreachable: ${reason}`);
  }

  if (statusCode !== 200) {
    throw new JournalLookupError(journal, `abbreviation service returned HTTP ${statusCode}`, statusCode);
  }

  const abbreviation = text.trim();
  if (abbreviation.length === 0) {
    throw new JournalLookupError(journal, "abbreviation service returned an empty answer", statusCode);
  }
  return abbreviation;
}

export function createAbbreviationClient(options: AbbreviationClientOptions = {}): AbbreviationFetcher {
  return (journal) => fetchAbbreviation(journal, options);
}
