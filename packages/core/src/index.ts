// Index
export { PathIndex, compareNodes } from "./index/path-index.ts";
export { ContentStore, buildDocument, emptyDocument } from "./index/content-store.ts";
export { SearchEngine, excerpt, DEFAULT_SEARCH_LIMIT } from "./index/search-engine.ts";

// Sync
export { SyncCoordinator } from "./sync/coordinator.ts";
export type { CoordinatorOptions, LiveReloadState, SendFn, Subscriber } from "./sync/coordinator.ts";
export { EditSession } from "./sync/edit-session.ts";
export type { SaveOutcome } from "./sync/edit-session.ts";
export { Watcher, fsWatchSource, DEFAULT_DEBOUNCE_MS } from "./sync/watcher.ts";
export type { RawEventSource, RawWatchHandle, RawWatchListener, WatcherOptions } from "./sync/watcher.ts";
export { DeadlineMap } from "./sync/deadlines.ts";
export { KeyedQueue } from "./sync/keyed-queue.ts";

// Integrations
export * as notesFs from "./integrations/notes-fs.ts";

// Errors
export {
  NotesError,
  IoError,
  InvalidPathError,
  EncodingError,
  WatchError,
  NotFoundError,
  ConfigError,
} from "./errors.ts";
export type { NotesErrorCode } from "./errors.ts";

// Types
export type { Config, NotesConfig, WatchConfig, SearchConfig, ServerConfig } from "./types/config.ts";
export { DEFAULT_CONFIG } from "./types/config.ts";
export type {
  NotePath,
  NodeKind,
  TreeNode,
  Document,
  Token,
  TokenField,
  Heading,
  NoteFrontmatter,
  ChangeEvent,
  ReloadNotification,
  NotesStats,
  FileStat,
} from "./types/notes.ts";
export type { SearchHit, SearchPosting } from "./types/search.ts";
export type {
  SaveRequest,
  SaveResponse,
  TreeResponse,
  NoteResponse,
  SearchResponse,
  HealthResponse,
  ErrorResponse,
} from "./types/api.ts";

// Utils
export { setVerbose, createLogger, debug, info, error, warn } from "./utils/logger.ts";
export type { Logger } from "./utils/logger.ts";
export {
  formatSearchResults,
  formatTree,
  formatStats,
  formatError,
} from "./utils/formatter.ts";
export {
  renderMarkdown,
  rewriteWikilinks,
  parseFrontmatter,
  extractWikilinks,
  extractHeadings,
  deriveTitle,
} from "./utils/markdown.ts";
export { tokenize, stemTerm, queryTerms } from "./utils/tokenize.ts";
export { createIgnoreMatcher, globToRegExp, DEFAULT_IGNORE } from "./utils/ignore.ts";
export type { IgnoreMatcher } from "./utils/ignore.ts";
export {
  normalizeNotePath,
  joinNotePath,
  parentOf,
  baseName,
  stem,
  isMarkdownPath,
  isWithin,
  toAbsolute,
  fromAbsolute,
} from "./utils/paths.ts";
