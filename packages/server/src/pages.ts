/**
 * HTML and XML pages
 *
 * The landing page, the route listing and the OpenSearch description.
 * Everything taken from the config is escaped before it is written out.
 */

import type { Route, RouteGroup } from "@keyhop/core";

const ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

/**
 * Escape text for HTML and XML element content or quoted attributes.
 */
export function escapeMarkup(text: string): string {
  return text.replace(/[&<>"']/g, (char) => ESCAPES[char] ?? char);
}

function layout(title: string, body: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>${escapeMarkup(title)}</title>
<link rel="search" type="application/opensearchdescription+xml" href="/keyhopsearch.xml" title="keyhop">
</head>
<body>
${body}
</body>
</html>
`;
}

export function renderIndexPage(publicAddress: string): string {
  const address = escapeMarkup(publicAddress);
  return layout(
    "keyhop",
    `<h1>keyhop</h1>
<form action="/hop" method="get">
<input type="text" name="to" autofocus>
<button type="submit">Hop</button>
</form>
<p>Add <code>http://${address}/hop?to=%s</code> as a search engine in your browser, or use the OpenSearch description this page advertises.</p>
<p><a href="/ls">List all routes</a></p>`
  );
}

/**
 * Listing of every visible route. Hidden groups and hidden routes are left
 * out; a route shows its description when it has one, else its path.
 */
export function renderListPage(groups: readonly RouteGroup[]): string {
  const sections = groups
    .filter((group) => !group.hidden)
    .map(renderGroup)
    .filter((section) => section !== "");

  return layout("keyhop: routes", `<h1>Routes</h1>\n${sections.join("\n")}`);
}

function renderGroup(group: RouteGroup): string {
  const rows = [...group.routes]
    .filter(([, route]) => !route.hidden)
    .map(([keyword, route]) => renderRouteRow(keyword, route));
  if (rows.length === 0) return "";

  const description = group.description ? `\n<p>${escapeMarkup(group.description)}</p>` : "";
  return `<section>
<h2>${escapeMarkup(group.name)}</h2>${description}
<table>
${rows.join("\n")}
</table>
</section>`;
}

function renderRouteRow(keyword: string, route: Route): string {
  const target = route.description ?? route.path;
  return `<tr><td class="keyword">${escapeMarkup(keyword)}</td><td>${escapeMarkup(target)}</td></tr>`;
}

export function renderOpenSearch(publicAddress: string): string {
  const address = escapeMarkup(publicAddress);
  return `<?xml version="1.0" encoding="UTF-8"?>
<OpenSearchDescription xmlns="http://a9.com/-/spec/opensearch/1.1/" xmlns:moz="http://www.mozilla.org/2006/browser/search/">
<ShortName>keyhop</ShortName>
<Description>Hop to where you need to go</Description>
<InputEncoding>UTF-8</InputEncoding>
<Url type="text/html" template="http://${address}/hop?to={searchTerms}"></Url>
<moz:SearchForm>http://${address}/</moz:SearchForm>
</OpenSearchDescription>
`;
}
