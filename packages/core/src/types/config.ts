export interface NotesConfig {
  root: string;
  /** Extra glob patterns the watcher and scanner skip, matched per path segment. */
  ignore: string[];
}

export interface WatchConfig {
  enabled: boolean;
  debounceMs: number;
  retryAttempts: number;
  retryDelayMs: number;
}

export interface SearchConfig {
  maxResults: number;
}

export interface ServerConfig {
  port: number;
  host: string;
}

export interface Config {
  notes: NotesConfig;
  watch: WatchConfig;
  search: SearchConfig;
  server: ServerConfig;
}

export const DEFAULT_CONFIG: Config = {
  notes: {
    root: "",
    ignore: [],
  },
  watch: {
    enabled: true,
    debounceMs: 300,
    retryAttempts: 3,
    retryDelayMs: 1000,
  },
  search: {
    maxResults: 50,
  },
  server: {
    port: 8989,
    host: "127.0.0.1",
  },
};
