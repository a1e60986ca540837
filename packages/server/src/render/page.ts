import type { TreeNode } from "@mdlive/core";

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

function hrefFor(path: string, kind: TreeNode["kind"]): string {
  const encoded = path.split("/").map(encodeURIComponent).join("/");
  return kind === "directory" ? `/${encoded}/` : `/${encoded}`;
}

export function renderListing(dirPath: string, children: TreeNode[]): string {
  const items: string[] = [];
  if (dirPath !== "") items.push(`  <li><a href="..">..</a></li>`);
  for (const child of children) {
    const label = child.kind === "directory" ? `${child.name}/` : child.name;
    items.push(`  <li><a href="${hrefFor(child.path, child.kind)}">${escapeHtml(label)}</a></li>`);
  }
  return `<ul class="file-listing">\n${items.join("\n")}\n</ul>`;
}

const LIVE_RELOAD = `<script>
(function () {
  var source = new EventSource("/events");
  source.onmessage = function (e) {
    var data = JSON.parse(e.data);
    if (data.type === "reload") location.reload();
  };
})();
</script>`;

/**
 * Minimal page shell. `editPath` marks the note the editor may load from
 * `/raw` and save back through `/save`.
 */
export function renderPage(options: { title: string; content: string; query?: string; editPath?: string }): string {
  const editAttr = options.editPath ? ` data-edit-path="${escapeHtml(options.editPath)}"` : "";
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>${escapeHtml(options.title)} - mdlive</title>
</head>
<body>
<nav class="navbar">
<form class="search-form" action="/" method="get">
<input type="text" name="q" placeholder="Search notes..." value="${escapeHtml(options.query ?? "")}" />
<button type="submit">Search</button>
</form>
</nav>
<main${editAttr}>
${options.content}
</main>
${LIVE_RELOAD}
</body>
</html>`;
}

export function renderResults(query: string, hits: Array<{ path: string; title: string; snippet: string }>): string {
  if (hits.length === 0) {
    return `<h1>No results for "${escapeHtml(query)}"</h1>`;
  }
  const items = hits.map(
    (hit) =>
      `<div class="search-result"><a href="${hrefFor(hit.path, "file")}">${escapeHtml(hit.title)}</a> <small>${escapeHtml(hit.path)}</small><p>${escapeHtml(hit.snippet)}</p></div>`,
  );
  return `<h1>Search results for "${escapeHtml(query)}"</h1>\n${items.join("\n")}`;
}
