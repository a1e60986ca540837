import { SyncCoordinator, formatSearchResults, info, error } from "@mdlive/core";
import { assertNotesRoot, loadConfig } from "../config.ts";

interface SearchOptions {
  limit?: number;
  json: boolean;
  notesDir?: string;
}

export async function searchCommand(queryStr: string, options: SearchOptions): Promise<void> {
  try {
    const config = await loadConfig({ notesDir: options.notesDir });
    await assertNotesRoot(config.notes.root);

    const coordinator = SyncCoordinator.fromConfig(config);
    await coordinator.start();
    const results = coordinator.query(queryStr, options.limit ?? config.search.maxResults);

    if (options.json) {
      console.log(JSON.stringify(results, null, 2));
    } else {
      info(formatSearchResults(results));
    }
  } catch (e) {
    error("Search failed:", e instanceof Error ? e.message : String(e));
    process.exit(1);
  }
}
