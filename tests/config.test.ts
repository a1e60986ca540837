import { afterEach, describe, expect, it, vi } from "vitest";
import { homedir } from "os";
import { join } from "path";
import { ConfigError, DEFAULT_CONFIG } from "@mdlive/core";
import { assertNotesRoot, mergeConfig, parseConfigFile } from "../packages/cli/src/config.ts";
import { makeNotes, removeNotes } from "./helpers.ts";

describe("mergeConfig", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("falls back to the defaults", () => {
    vi.stubEnv("MDLIVE_ROOT", "");
    vi.stubEnv("MDLIVE_PORT", "");
    vi.stubEnv("MDLIVE_DEBOUNCE_MS", "");

    const config = mergeConfig({});
    expect(config.notes.root).toBe(join(homedir(), "src", "Notes"));
    expect(config.server).toEqual({ port: 8989, host: "127.0.0.1" });
    expect(config.watch).toEqual(DEFAULT_CONFIG.watch);
  });

  it("lets the environment override the file and flags override both", () => {
    vi.stubEnv("MDLIVE_ROOT", "/env/notes");
    vi.stubEnv("MDLIVE_PORT", "7000");
    vi.stubEnv("MDLIVE_DEBOUNCE_MS", "");
    const file = { notes: { root: "/file/notes" }, server: { port: 6000 }, watch: { debounceMs: 50 } };

    const fromEnv = mergeConfig(file);
    expect(fromEnv.notes.root).toBe("/env/notes");
    expect(fromEnv.server.port).toBe(7000);
    expect(fromEnv.watch.debounceMs).toBe(50);

    const fromFlags = mergeConfig(file, { notesDir: "/flag/notes", port: 9000, debounceMs: 10, watch: false });
    expect(fromFlags.notes.root).toBe("/flag/notes");
    expect(fromFlags.server.port).toBe(9000);
    expect(fromFlags.watch).toEqual({ ...DEFAULT_CONFIG.watch, enabled: false, debounceMs: 10 });
  });

  it("rejects a malformed port in the environment", () => {
    vi.stubEnv("MDLIVE_PORT", "eighty");
    expect(() => mergeConfig({})).toThrow(ConfigError);
  });
});

describe("parseConfigFile", () => {
  it("accepts a partial file", () => {
    expect(parseConfigFile('{"server":{"port":1234},"notes":{"ignore":["archive/**"]}}')).toEqual({
      server: { port: 1234 },
      notes: { ignore: ["archive/**"] },
    });
  });

  it("rejects unknown keys and bad values", () => {
    expect(() => parseConfigFile('{"bogus":1}', "test.json")).toThrow(ConfigError);
    expect(() => parseConfigFile('{"server":{"port":0}}', "test.json")).toThrow(/server\.port/);
    expect(() => parseConfigFile("{not json", "test.json")).toThrow("test.json is not valid JSON");
  });
});

describe("assertNotesRoot", () => {
  it("accepts a readable directory and rejects anything else", async () => {
    const root = await makeNotes({ "file.md": "x" });
    try {
      await expect(assertNotesRoot(root)).resolves.toBeUndefined();
      await expect(assertNotesRoot(join(root, "file.md"))).rejects.toThrow("is not a directory");
      await expect(assertNotesRoot(join(root, "missing"))).rejects.toBeInstanceOf(ConfigError);
    } finally {
      await removeNotes(root);
    }
  });
});
