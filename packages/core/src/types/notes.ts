/**
 * Normalized, slash-separated path relative to the notes root.
 * The root directory itself is `""`.
 */
export type NotePath = string;

export type NodeKind = "file" | "directory";

export interface TreeNode {
  path: NotePath;
  kind: NodeKind;
  name: string;
  /** Ordered child paths; directories only. */
  children: NotePath[];
  mtimeMs: number;
  /** Byte size; files only. */
  size?: number;
}

export interface NoteFrontmatter {
  title?: string;
  tags?: string[];
  aliases?: string[];
  [key: string]: unknown;
}

export type TokenField = "title" | "body";

export interface Token {
  term: string;
  /** Ordinal of the token within its field. */
  position: number;
  /** Character offset into the field text. */
  offset: number;
  field: TokenField;
}

export interface Heading {
  level: number;
  text: string;
}

export interface Document {
  path: NotePath;
  title: string;
  raw: string;
  /** Markdown body with frontmatter removed; what `html` and body tokens are built from. */
  body: string;
  html: string;
  frontmatter: NoteFrontmatter;
  tokens: Token[];
  headings: Heading[];
  wikilinks: string[];
  /** sha256 of the on-disk bytes. */
  hash: string;
  mtimeMs: number;
}

export type ChangeEvent =
  | { type: "created"; path: NotePath }
  | { type: "modified"; path: NotePath }
  | { type: "removed"; path: NotePath }
  | { type: "renamed"; from: NotePath; to: NotePath };

export interface ReloadNotification {
  type: "reload";
  path: NotePath;
}

export interface NotesStats {
  totalNotes: number;
  totalFolders: number;
  root: string;
}

export interface FileStat {
  kind: NodeKind;
  mtimeMs: number;
  size: number;
}
