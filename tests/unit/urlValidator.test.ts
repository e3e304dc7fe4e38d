// tests/unit/urlValidator.test.ts

import { UrlValidator } from "../../src/utils/UrlValidator";

describe("UrlValidator", () => {
  describe("isFetchableUrl", () => {
    it("should accept http and https only", () => {
      expect(UrlValidator.isFetchableUrl("https://example.com")).toBe(true);
      expect(UrlValidator.isFetchableUrl("http://example.com/a")).toBe(true);
      expect(UrlValidator.isFetchableUrl("ftp://example.com/file")).toBe(false);
      expect(UrlValidator.isFetchableUrl("mailto:someone@example.com")).toBe(false);
      expect(UrlValidator.isFetchableUrl("/relative")).toBe(false);
    });
  });

  describe("extractUrlPath", () => {
    it("should default to the root path", () => {
      expect(UrlValidator.extractUrlPath("https://x.test")).toBe("/");
      expect(UrlValidator.extractUrlPath("not-a-url")).toBe("/");
    });

    it("should drop query and fragment", () => {
      expect(UrlValidator.extractUrlPath("https://x.test/path?q=1#frag")).toBe("/path");
    });

    it("should percent-decode the path", () => {
      expect(UrlValidator.extractUrlPath("https://x.test/100%25/caf%C3%A9")).toBe("/100%/café");
    });

    it("should keep decoded whitespace on a single line", () => {
      expect(UrlValidator.extractUrlPath("https://x.test/a%0A%0A%0A%0Ab")).toBe("/a b");
      expect(UrlValidator.extractUrlPath("https://x.test/tab%09%0D%0Aend%20")).toBe("/tab end");
    });

    it("should keep malformed escapes as they are", () => {
      expect(UrlValidator.extractUrlPath("https://x.test/50%zz/caf%C3%A9")).toBe("/50%zz/café");
    });
  });
});
