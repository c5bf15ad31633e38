import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { MockAgent } from "undici";
import { abbreviationUrl, fetchAbbreviation } from "../../src/journal/client.js";
import { JournalLookupError } from "../../src/utils/errors.js";

const ORIGIN = "https://abbrev.test";
const BASE_URL = `${ORIGIN}/a/`;

describe("abbreviationUrl", () => {
  it("url-encodes the title and tolerates a missing trailing slash", () => {
    expect(abbreviationUrl(BASE_URL, "Journal of Testing & Q/A")).toBe(
      "https://abbrev.test/a/Journal%20of%20Testing%20%26%20Q%2FA"
    );
    expect(abbreviationUrl("https://abbrev.test/a", "Nature")).toBe("https://abbrev.test/a/Nature");
  });
});

describe("fetchAbbreviation", () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  function lookup(journal: string): Promise<string> {
    return fetchAbbreviation(journal, { baseUrl: BASE_URL, timeoutMs: 1_000, dispatcher: agent });
  }

  it("returns the trimmed plain-text answer", async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: "/a/Journal%20of%20Testing", method: "GET" })
      .reply(200, "J. Test.\n");

    await expect(lookup("Journal of Testing")).resolves.toBe("J. Test.");
  });

  it("fails with the status code on a non-200 answer", async () => {
    agent.get(ORIGIN).intercept({ path: "/a/Nature", method: "GET" }).reply(503, "busy");

    const error = await lookup("Nature").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(JournalLookupError);
    expect(error).toMatchObject({
      journal: "Nature",
      statusCode: 503,
      message: "abbreviation service returned HTTP 503",
    });
  });

  it("fails on an empty answer", async () => {
    agent.get(ORIGIN).intercept({ path: "/a/Nature", method: "GET" }).reply(200, "   ");
    await expect(lookup("Nature")).rejects.toThrow("abbreviation service returned an empty answer");
  });

  it("wraps transport errors", async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: "/a/Nature", method: "GET" })
      .replyWithError(new Error("connection refused"));

    await expect(lookup("Nature")).rejects.toThrow(/^abbreviation service unreachable: /);
  });
});
