import { describe, it, expect } from "vitest";
import { documentToText, pageTextLines } from "./pageText";

describe("pageTextLines", () => {
  it("returns one line per innermost block in document order", () => {
    const html = `
      <html><head><style>.x { color: red }</style></head>
      <body>
        <div class="card">
          <h3><a href="/e/1">Teen <em>Studio</em></a></h3>
          <p>Saturday,
             March 14</p>
          <script>window.x = 1;</script>
        </div>
        <ul><li>Free</li><li>Free</li></ul>
      </body></html>`;
    expect(pageTextLines(html)).toEqual(["Teen Studio", "Saturday, March 14", "Free"]);
  });

  it("falls back to the whole text for pages without blocks", () => {
    expect(pageTextLines("<span>just</span> <b>text</b>")).toEqual(["just text"]);
  });
});

describe("documentToText", () => {
  it("joins lines and truncates", () => {
    expect(documentToText("<p>one</p><p>two</p>", 100)).toBe("one\ntwo");
    expect(documentToText("<p>one</p><p>two</p>", 5)).toBe("one\nt");
  });
});
