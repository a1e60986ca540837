import { SyncCoordinator, formatStats, formatTree, info, error } from "@mdlive/core";
import { assertNotesRoot, loadConfig } from "../config.ts";

export async function treeCommand(path: string | undefined, options: { notesDir?: string }): Promise<void> {
  try {
    const config = await loadConfig({ notesDir: options.notesDir });
    await assertNotesRoot(config.notes.root);

    const coordinator = SyncCoordinator.fromConfig(config);
    await coordinator.start();

    const { children } = coordinator.tree(path ?? "");
    console.log(formatTree(children, (node) => coordinator.tree(node.path).children));
    info(`\n${formatStats(coordinator.stats())}`);
  } catch (e) {
    error("Listing failed:", e instanceof Error ? e.message : String(e));
    process.exit(1);
  }
}
