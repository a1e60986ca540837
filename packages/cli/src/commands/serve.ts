import { error, formatError } from "@mdlive/core";
import { assertNotesRoot, loadConfig, type CliOverrides } from "../config.ts";

export async function serveCommand(options: CliOverrides): Promise<void> {
  try {
    const config = await loadConfig(options);
    await assertNotesRoot(config.notes.root);

    const { startServer } = await import("@mdlive/server");
    await startServer(config);
  } catch (e) {
    error(formatError(e instanceof Error ? e.message : String(e)));
    process.exit(1);
  }
}
