import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  RobotsPolicyCache,
  isPathAllowed,
  parseRobotsTxt,
  productToken,
  selectGroup,
} from "../src/lib/robots.js";
import { fakeClock, fakeFetch, html, text } from "./support.js";

const USER_AGENT = "TestBot/1.0 (+contact: ops@example.com)";

const ROBOTS = `
# listings are fine, the rest is not
User-agent: *
Disallow: /private
Allow: /private/open
Crawl-delay: 3
Sitemap: https://example.com/sitemap.xml

User-agent: ListingBot
User-agent: OtherBot
Disallow: /
Allow: /listings
`;

describe("parseRobotsTxt", () => {
  it("groups consecutive user-agent lines", () => {
    const parsed = parseRobotsTxt(ROBOTS);

    expect(parsed.groups).toHaveLength(2);
    expect(parsed.groups[1]?.agents).toEqual(["listingbot", "otherbot"]);
    expect(parsed.sitemaps).toEqual(["https://example.com/sitemap.xml"]);
  });

  it("selects the group naming our product token", () => {
    const parsed = parseRobotsTxt(ROBOTS);

    expect(selectGroup(parsed, "listingbot")).toEqual({
      rules: [
        { allow: false, pattern: "/" },
        { allow: true, pattern: "/listings" },
      ],
      crawlDelayMs: undefined,
    });
  });

  it("falls back to the * group and its crawl delay", () => {
    const group = selectGroup(parseRobotsTxt(ROBOTS), "somebot");

    expect(group.crawlDelayMs).toBe(3000);
    expect(group.rules).toHaveLength(2);
  });

  it("matches the agent name exactly, ignoring case and version", () => {
    const parsed = parseRobotsTxt(
      "User-agent: *\nDisallow: /all\n\nUser-agent: T\nDisallow: /prefix\n\nUser-agent: TestBot/1.0\nDisallow: /versioned\n"
    );

    expect(selectGroup(parsed, "testbot").rules).toEqual([
      { allow: false, pattern: "/versioned" },
    ]);
    expect(selectGroup(parsed, "testbotextra").rules).toEqual([
      { allow: false, pattern: "/all" },
    ]);
  });

  it("treats an empty Disallow as allow-all", () => {
    const parsed = parseRobotsTxt("User-agent: *\nDisallow:\n");

    expect(parsed.groups[0]?.rules).toEqual([]);
    expect(isPathAllowed([], "/anything")).toBe(true);
  });

  it("rejects content without directives", () => {
    expect(() => parseRobotsTxt("<html><body>Not found</body></html>")).toThrow(
      "no robots.txt directives found"
    );
  });

  it("accepts an empty or comment-only file", () => {
    expect(parseRobotsTxt("")).toEqual({ groups: [], sitemaps: [] });
    expect(parseRobotsTxt("# nothing here\n")).toEqual({ groups: [], sitemaps: [] });
  });

  it("takes the product token from the user agent", () => {
    expect(productToken(USER_AGENT)).toBe("testbot");
  });
});

describe("isPathAllowed", () => {
  const rules = selectGroup(parseRobotsTxt(ROBOTS), "somebot").rules;

  it("lets the longest matching rule decide", () => {
    expect(isPathAllowed(rules, "/private/x")).toBe(false);
    expect(isPathAllowed(rules, "/private/open/1")).toBe(true);
    expect(isPathAllowed(rules, "/public")).toBe(true);
  });

  it("always allows robots.txt itself", () => {
    expect(isPathAllowed([{ allow: false, pattern: "/" }], "/robots.txt")).toBe(true);
  });

  it("supports * and $ in patterns", () => {
    const pdf = [{ allow: false, pattern: "/*.pdf$" }];
    expect(isPathAllowed(pdf, "/docs/a.pdf")).toBe(false);
    expect(isPathAllowed(pdf, "/docs/a.pdf?x=1")).toBe(true);
  });

  it("prefers Allow on equal length", () => {
    expect(
      isPathAllowed(
        [
          { allow: false, pattern: "/page" },
          { allow: true, pattern: "/page" },
        ],
        "/page/2"
      )
    ).toBe(true);
  });
});

describe("RobotsPolicyCache", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function createCache(handler: (url: string) => Response | Promise<Response>, ttlMs = 1000) {
    const clock = fakeClock();
    const { fetch, calls } = fakeFetch(handler);
    const cache = new RobotsPolicyCache({
      userAgent: USER_AGENT,
      ttlMs,
      requestTimeoutMs: 1000,
      fetch,
      clock,
    });
    return { cache, calls, clock };
  }

  it("fetches robots.txt over https and applies it", async () => {
    const { cache, calls } = createCache(() => text(ROBOTS));

    expect(await cache.check("https://example.com/private/x")).toEqual({
      allowed: false,
      reason: "disallowed",
    });
    expect(await cache.check("https://example.com/homes?page=2")).toEqual({
      allowed: true,
      crawlDelayMs: 3000,
    });
    expect(calls.map((c) => c.url)).toEqual(["https://example.com/robots.txt"]);
  });

  it("applies the group for our user agent", async () => {
    const { cache } = createCache(() =>
      text("User-agent: testbot\nDisallow: /\n\nUser-agent: *\nAllow: /\n")
    );

    expect(await cache.isAllowed("https://example.com/homes")).toBe(false);
  });

  it("denies the whole domain when robots.txt fails and keeps denying", async () => {
    const { cache, calls } = createCache(() => text("oops", 500));

    expect(await cache.check("https://example.com/homes")).toEqual({
      allowed: false,
      reason: "unavailable",
    });
    expect(await cache.isAllowed("https://example.com/other")).toBe(false);
    expect(cache.peek("example.com")?.kind).toBe("denied");
    expect(calls).toHaveLength(1);
  });

  it("denies on network errors and malformed files", async () => {
    const down = createCache(() => {
      throw new TypeError("fetch failed");
    });
    expect(await down.cache.isAllowed("https://example.com/")).toBe(false);

    const garbled = createCache(() => html("<html><body>Welcome</body></html>"));
    expect(await garbled.cache.isAllowed("https://example.com/")).toBe(false);
  });

  it("shares one load between concurrent lookups", async () => {
    const { cache, calls } = createCache(() => text("User-agent: *\nAllow: /\n"));

    const results = await Promise.all([
      cache.isAllowed("https://example.com/a"),
      cache.isAllowed("https://example.com/b"),
      cache.isAllowed("https://example.com/c"),
    ]);

    expect(results).toEqual([true, true, true]);
    expect(calls).toHaveLength(1);
  });

  it("loads each domain separately", async () => {
    const { cache, calls } = createCache(() => text("User-agent: *\nAllow: /\n"));

    await cache.isAllowed("https://a.example.com/");
    await cache.isAllowed("https://b.example.com/");

    expect(calls.map((c) => c.url)).toEqual([
      "https://a.example.com/robots.txt",
      "https://b.example.com/robots.txt",
    ]);
  });

  it("refreshes after the ttl, including a denied domain", async () => {
    let count = 0;
    const { cache, calls, clock } = createCache(() => {
      count++;
      return count === 1 ? text("busy", 503) : text("User-agent: *\nAllow: /\n");
    });

    expect(await cache.isAllowed("https://example.com/")).toBe(false);
    clock.advance(999);
    expect(await cache.isAllowed("https://example.com/")).toBe(false);
    clock.advance(2);
    expect(await cache.isAllowed("https://example.com/")).toBe(true);
    expect(calls).toHaveLength(2);
  });
});
