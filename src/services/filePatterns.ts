const escapeRegex = (value: string): string => value.replace(/[.+^${}()|[\]\\]/g, "\\$&");

export const globToRegExp = (pattern: string): RegExp => {
  const normalized = pattern.replace(/\\/g, "/").replace(/^\.\//, "");
  let source = "";
  for (let index = 0; index < normalized.length; index += 1) {
    const ch = normalized[index];
    if (ch === "*") {
      if (normalized[index + 1] === "*") {
        const followedBySlash = normalized[index + 2] === "/";
        source += followedBySlash ? "(?:.*/)?" : ".*";
        index += followedBySlash ? 2 : 1;
        continue;
      }
      source += "[^/]*";
      continue;
    }
    if (ch === "?") {
      source += "[^/]";
      continue;
    }
    source += escapeRegex(ch);
  }
  // bare patterns such as "*.ts" match at any depth
  const anchored = normalized.includes("/") ? `^${source}$` : `^(?:.*/)?${source}$`;
  return new RegExp(anchored);
};

export const matchesAny = (filePath: string, patterns: readonly string[]): boolean => {
  const normalized = filePath.replace(/\\/g, "/").replace(/^\.\//, "");
  return patterns.some((pattern) => globToRegExp(pattern).test(normalized));
};

export const filterFiles = (
  files: readonly string[],
  include: readonly string[],
  exclude: readonly string[]
): string[] =>
  files.filter((file) => (include.length === 0 || matchesAny(file, include)) && !matchesAny(file, exclude));
