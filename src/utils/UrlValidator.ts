export class UrlValidator {
  static isFetchableUrl(url: string): boolean {
    try {
      const urlObj = new URL(url);
      return ["http:", "https:"].includes(urlObj.protocol);
    } catch {
      return false;
    }
  }

  /**
   * Percent-decoded path component on one line, "/" when the URL has none or
   * cannot be parsed. Malformed escapes are kept verbatim.
   */
  static extractUrlPath(url: string): string {
    let pathname: string;
    try {
      pathname = new URL(url).pathname;
    } catch {
      return "/";
    }

    return UrlValidator.decodePath(pathname).replace(/\s+/g, " ").trim() || "/";
  }

  private static decodePath(pathname: string): string {
    try {
      return decodeURIComponent(pathname);
    } catch {
      return pathname.replace(/(?:%[0-9a-f]{2})+/gi, (run) => {
        try {
          return decodeURIComponent(run);
        } catch {
          return run;
        }
      });
    }
  }
}
