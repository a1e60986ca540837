/** Hidden entries, `_drafts`-style folders, editor swap and backup files. */
export const DEFAULT_IGNORE = [".*", "_*", "*~", "*.swp", "*.swx", "*.swo", "*.tmp", "4913"];

export interface IgnoreMatcher {
  ignores(path: string): boolean;
}

export function globToRegExp(glob: string): RegExp {
  let source = "";
  for (let i = 0; i < glob.length; i++) {
    const ch = glob.charAt(i);
    if (ch === "*") {
      if (glob.charAt(i + 1) === "*") {
        source += ".*";
        i++;
      } else {
        source += "[^/]*";
      }
    } else if (ch === "?") {
      source += "[^/]";
    } else {
      source += ch.replace(/[.+^${}()|[\]\\]/g, "\\$&");
    }
  }
  return new RegExp(`^${source}$`);
}

/**
 * Patterns without a slash are tested against every segment of the path;
 * patterns with one are tested against the whole path.
 */
export function createIgnoreMatcher(
  patterns: string[] = [],
  options: { defaults?: boolean } = {},
): IgnoreMatcher {
  const all = options.defaults === false ? patterns : [...DEFAULT_IGNORE, ...patterns];
  const segmentRules = all.filter((p) => !p.includes("/")).map(globToRegExp);
  const pathRules = all
    .filter((p) => p.includes("/"))
    .map((p) => globToRegExp(p.replace(/^\/+/, "")));

  return {
    ignores(path: string): boolean {
      if (path === "") return false;
      if (pathRules.some((re) => re.test(path))) return true;
      const segments = path.split("/");
      return segments.some((segment) => segmentRules.some((re) => re.test(segment)));
    },
  };
}

