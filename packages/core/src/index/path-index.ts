import { scanTree, type ScanEntry, type ScanOptions } from "../integrations/notes-fs.ts";
import type { FileStat, NodeKind, NotePath, NotesStats, TreeNode } from "../types/notes.ts";
import { baseName, isWithin, parentOf } from "../utils/paths.ts";

/**
 * Directories first, then by name in UTF-16 code unit order, so `Zebra`
 * sorts before `apple`. The tree view depends on this order.
 */
export function compareNodes(a: TreeNode, b: TreeNode): number {
  if (a.kind !== b.kind) return a.kind === "directory" ? -1 : 1;
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

function rootNode(): TreeNode {
  return { path: "", kind: "directory", name: "", children: [], mtimeMs: 0 };
}

/**
 * In-memory directory tree keyed by NotePath. Holds no file content and
 * performs no I/O apart from the scan in `rebuild`.
 */
export class PathIndex {
  private nodes = new Map<NotePath, TreeNode>([["", rootNode()]]);
  private displaced: NotePath[] = [];

  /** Replaces the whole tree with a fresh scan of `root`. */
  async rebuild(root: string, options: ScanOptions = {}): Promise<TreeNode> {
    const entries = await scanTree(root, options);
    this.load(entries);
    return this.root;
  }

  /** Replaces the whole tree with `entries` in one step. */
  load(entries: ScanEntry[]): void {
    const next = new PathIndex();
    for (const entry of entries) {
      next.upsert(entry.path, entry.kind, entry);
    }
    this.nodes = next.nodes;
  }

  get root(): TreeNode {
    return this.require("");
  }

  get size(): number {
    return this.nodes.size - 1;
  }

  lookup(path: NotePath): TreeNode | undefined {
    return this.nodes.get(path);
  }

  has(path: NotePath, kind?: NodeKind): boolean {
    const node = this.nodes.get(path);
    return node !== undefined && (kind === undefined || node.kind === kind);
  }

  /**
   * Inserts or updates one node, creating missing ancestor directories.
   * A node of the other kind standing at `path` or at an ancestor is
   * replaced, and the files removed with it are kept for `takeDisplaced`.
   */
  upsert(path: NotePath, kind: NodeKind, stat?: Partial<FileStat>): TreeNode {
    if (path === "") return this.root;

    const parent = this.ensureDirectory(parentOf(path));
    const existing = this.nodes.get(path);

    if (existing && existing.kind !== kind) {
      this.displaced.push(...this.remove(path));
    }

    const current = this.nodes.get(path);
    const node: TreeNode = {
      path,
      kind,
      name: baseName(path),
      children: kind === "directory" ? current?.children ?? [] : [],
      mtimeMs: stat?.mtimeMs ?? current?.mtimeMs ?? 0,
    };
    if (kind === "file") node.size = stat?.size ?? current?.size ?? 0;

    this.nodes.set(path, node);
    if (!current) this.link(parent, path);
    return node;
  }

  /** Removes a node and everything below it. Returns the removed file paths. */
  remove(path: NotePath): NotePath[] {
    const node = this.nodes.get(path);
    if (!node || path === "") return [];

    const removedFiles: NotePath[] = [];
    const stack: NotePath[] = [path];
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined) break;
      const n = this.nodes.get(current);
      if (!n) continue;
      if (n.kind === "file") removedFiles.push(current);
      stack.push(...n.children);
      this.nodes.delete(current);
    }

    const parent = this.nodes.get(parentOf(path));
    if (parent) {
      parent.children = parent.children.filter((child) => child !== path);
    }

    return removedFiles.sort();
  }

  /** Files dropped by `upsert` replacing a node of the other kind since the last call. */
  takeDisplaced(): NotePath[] {
    const out = this.displaced.sort();
    this.displaced = [];
    return out;
  }

  /** Child nodes of a directory in display order. */
  children(path: NotePath): TreeNode[] {
    const node = this.nodes.get(path);
    if (!node || node.kind !== "directory") return [];
    return node.children
      .map((child) => this.nodes.get(child))
      .filter((child): child is TreeNode => child !== undefined);
  }

  /** All file paths, optionally limited to a subtree, sorted. */
  files(under: NotePath = ""): NotePath[] {
    const out: NotePath[] = [];
    for (const node of this.nodes.values()) {
      if (node.kind === "file" && isWithin(node.path, under)) out.push(node.path);
    }
    return out.sort();
  }

  stats(root: string): NotesStats {
    let totalNotes = 0;
    let totalFolders = 0;
    for (const node of this.nodes.values()) {
      if (node.path === "") continue;
      if (node.kind === "file") totalNotes++;
      else totalFolders++;
    }
    return { totalNotes, totalFolders, root };
  }

  private ensureDirectory(path: NotePath): TreeNode {
    const existing = this.nodes.get(path);
    if (existing?.kind === "directory") return existing;
    return this.upsert(path, "directory");
  }

  private link(parent: TreeNode, child: NotePath): void {
    const next = [...parent.children, child];
    next.sort((a, b) => {
      const na = this.nodes.get(a);
      const nb = this.nodes.get(b);
      if (!na || !nb) return 0;
      return compareNodes(na, nb);
    });
    parent.children = next;
  }

  private require(path: NotePath): TreeNode {
    const node = this.nodes.get(path);
    if (!node) throw new Error(`PathIndex has no node for "${path}"`);
    return node;
  }
}
