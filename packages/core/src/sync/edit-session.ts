import { InvalidPathError } from "../errors.ts";
import { assertInsideRoot, writeNoteAtomic } from "../integrations/notes-fs.ts";
import type { NotePath } from "../types/notes.ts";
import { createLogger } from "../utils/logger.ts";
import { isMarkdownPath, normalizeNotePath } from "../utils/paths.ts";
import type { SyncCoordinator } from "./coordinator.ts";

const log = createLogger("edit");

export interface SaveOutcome {
  path: NotePath;
  /** sha256 of the bytes written. */
  hash: string;
  created: boolean;
}

/**
 * Writes edited note content back to disk and pushes it through the same
 * update path as a filesystem change, before returning. The watcher's later
 * event for the same write finds an identical content hash and is not
 * broadcast a second time.
 */
export class EditSession {
  constructor(private readonly coordinator: SyncCoordinator) {}

  async save(requestedPath: string, content: string): Promise<SaveOutcome> {
    const path = this.validate(requestedPath);
    const existing = this.coordinator.lookup(path);
    if (existing?.kind === "directory") {
      throw new InvalidPathError(requestedPath, "is a directory");
    }

    await assertInsideRoot(this.coordinator.root, path);
    const hash = await writeNoteAtomic(this.coordinator.root, path, content);
    const created = existing === undefined;
    await this.coordinator.apply({ type: created ? "created" : "modified", path });

    log.info(`saved ${path} (${Buffer.byteLength(content, "utf8")} bytes)`);
    return { path, hash, created };
  }

  private validate(requestedPath: string): NotePath {
    const path = normalizeNotePath(requestedPath);
    if (path === "") {
      throw new InvalidPathError(requestedPath, "no file name");
    }
    if (!isMarkdownPath(path)) {
      throw new InvalidPathError(requestedPath, "only .md files can be saved");
    }
    if (this.coordinator.ignore.ignores(path)) {
      throw new InvalidPathError(requestedPath, "path is excluded from the notes index");
    }
    return path;
  }
}
