// tests/unit/filterInvisible.test.ts
import { load } from "cheerio";
import { collectText, filterInvisible, selectScope } from "../../src/transforms";

const visibleText = (html: string) =>
  collectText(filterInvisible(selectScope(load(html)).scope)).replace(/\s+/g, " ").trim();

describe("filterInvisible", () => {
  it("removes non-rendered elements with their subtrees", () => {
    const html = `
      <div>
        <script>var hidden = "script text";</script>
        <style>.hidden { color: red; }</style>
        <noscript>Enable JavaScript</noscript>
        <img alt="alt text" title="image title" src="a.png">
        <svg><title>icon title</title><text>svg text</text></svg>
        <iframe src="/frame">frame text</iframe>
        Visible
      </div>
    `;

    expect(visibleText(html)).toBe("Visible");
  });

  it("removes header and footer at any depth", () => {
    const html = `
      <main>
        <section>
          <header>Section nav</header>
          <p>Kept</p>
          <div><footer>Nested footer</footer></div>
        </section>
      </main>
    `;

    expect(visibleText(html)).toBe("Kept");
  });

  it("keeps attribute values out of the text", () => {
    expect(visibleText(`<a href="/x" title="tooltip">Label</a>`)).toBe("Label");
  });
});
