import { describe, it, expect } from "vitest";
import { createRoute, createRouteGroup } from "@keyhop/core";

import { escapeMarkup, renderListPage, renderOpenSearch } from "../pages.js";

describe("escapeMarkup", () => {
  it("escapes markup characters", () => {
    expect(escapeMarkup(`<a href="x">Tom & 'Jerry'</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;Tom &amp; &#39;Jerry&#39;&lt;/a&gt;"
    );
  });
});

describe("renderListPage", () => {
  const visible = createRoute({ path: "https://a.test/?q=<{{query}}>", kind: "external" });
  const hidden = createRoute({ path: "https://b.test/", kind: "external", hidden: true });

  it("escapes keywords and paths", () => {
    const group = createRouteGroup({ name: "A & B", routes: new Map([["<a>", visible]]) });

    const page = renderListPage([group]);
    expect(page).toContain("<h2>A &amp; B</h2>");
    expect(page).toContain(
      '<tr><td class="keyword">&lt;a&gt;</td><td>https://a.test/?q=&lt;{{query}}&gt;</td></tr>'
    );
  });

  it("drops a group whose routes are all hidden", () => {
    const group = createRouteGroup({ name: "Ghosts", routes: new Map([["b", hidden]]) });

    expect(renderListPage([group])).not.toContain("<section>");
  });
});

describe("renderOpenSearch", () => {
  it("points the search form at the public address", () => {
    expect(renderOpenSearch("hop.test")).toContain(
      "<moz:SearchForm>http://hop.test/</moz:SearchForm>"
    );
  });
});
