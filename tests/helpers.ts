import { mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { dirname, join } from "path";

/** Creates a temporary notes root. Keys ending in `/` become empty directories. */
export async function makeNotes(files: Record<string, string | Uint8Array> = {}): Promise<string> {
  const root = await mkdtemp(join(tmpdir(), "mdlive-test-"));
  await writeNotes(root, files);
  return root;
}

export async function writeNotes(root: string, files: Record<string, string | Uint8Array>): Promise<void> {
  for (const [path, content] of Object.entries(files)) {
    const abs = join(root, ...path.split("/").filter(Boolean));
    if (path.endsWith("/")) {
      await mkdir(abs, { recursive: true });
      continue;
    }
    await mkdir(dirname(abs), { recursive: true });
    await writeFile(abs, content);
  }
}

export async function removeNotes(root: string): Promise<void> {
  await rm(root, { recursive: true, force: true });
}
