import type { TreeNode } from "../types/notes.ts";
import type { SearchHit } from "../types/search.ts";

const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const CYAN = "\x1b[36m";
const GREEN = "\x1b[32m";
const YELLOW = "\x1b[33m";
const BLUE = "\x1b[34m";

export function formatSearchResults(results: SearchHit[]): string {
  if (results.length === 0) {
    return `${DIM}No results found.${RESET}`;
  }

  const lines: string[] = [];

  results.forEach((r, i) => {
    const rank = `${DIM}${String(i + 1).padStart(2)}.${RESET}`;
    const score = `${YELLOW}[${r.score.toFixed(3)}]${RESET}`;
    const path = `${CYAN}${r.path}${RESET}`;
    const title = r.title ? ` ${BOLD}${r.title}${RESET}` : "";

    lines.push(`${rank} ${score} ${path}${title}`);

    if (r.snippet) {
      lines.push(`      ${DIM}${r.snippet}${RESET}`);
    }

    lines.push("");
  });

  return lines.join("\n");
}

/**
 * Indented tree listing. `childrenOf` is called for every directory, so the
 * caller controls ordering and depth.
 */
export function formatTree(
  nodes: TreeNode[],
  childrenOf: (node: TreeNode) => TreeNode[],
  depth = 0,
): string {
  const lines: string[] = [];
  const indent = "  ".repeat(depth);

  for (const node of nodes) {
    if (node.kind === "directory") {
      lines.push(`${indent}${BLUE}${node.name}/${RESET}`);
      const nested = formatTree(childrenOf(node), childrenOf, depth + 1);
      if (nested) lines.push(nested);
    } else {
      lines.push(`${indent}${node.name}`);
    }
  }

  return lines.join("\n");
}

export function formatStats(stats: { totalNotes: number; totalFolders: number; root: string }): string {
  return [
    `${BOLD}Root:${RESET}    ${DIM}${stats.root}${RESET}`,
    `${BOLD}Notes:${RESET}   ${GREEN}${stats.totalNotes}${RESET}`,
    `${BOLD}Folders:${RESET} ${GREEN}${stats.totalFolders}${RESET}`,
  ].join("\n");
}

export function formatError(message: string): string {
  return `\x1b[31m✗${RESET} ${message}`;
}
