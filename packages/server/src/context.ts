import type { Config, EditSession, SyncCoordinator } from "@mdlive/core";

export interface ServerContext {
  config: Config;
  coordinator: SyncCoordinator;
  editor: EditSession;
}
