/**
 * Wildcard file resolver.
 *
 * Reads wildcard collections from a directory of text files, one value
 * per line:
 *
 *   wildcards/
 *     animals.txt          → __animals__
 *     colors/warm.txt      → __colors/warm__
 *
 * Lines are trimmed. Blank lines and lines starting with "#" are skipped.
 *
 * USAGE:
 *
 *   const resolver = new WildcardFileResolver("wildcards/");
 *   resolver.resolve("colors/warm");   // values of colors/warm.txt
 *   resolver.resolve("colors/*");      // every file under colors/
 *   resolver.listWildcards();          // ["animals", "colors/warm"]
 *
 * Files are read once and cached. Call clearCache() after editing them.
 */

import { existsSync, readFileSync, readdirSync, statSync } from "node:fs";
import { join, relative, resolve, sep } from "node:path";

import { isGlob, resolveGlob } from "./glob.js";
import type { WildcardResolver } from "./resolver.js";

export class WildcardLoadError extends Error {
  constructor(
    public readonly filePath: string,
    message?: string,
    options?: { cause?: unknown }
  ) {
    super(message ?? `Failed to load wildcards: ${filePath}`, options);
    this.name = "WildcardLoadError";
  }
}

const WILDCARD_EXTENSION = ".txt";

function parseWildcardFile(source: string): string[] {
  return source
    .replace(/^\uFEFF/, "")
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "" && !line.startsWith("#"));
}

export class WildcardFileResolver implements WildcardResolver {
  private readonly baseDir: string;
  private readonly cache = new Map<string, readonly string[]>();
  private names: string[] | undefined;

  /**
   * @param baseDir - Directory containing wildcard .txt files
   * @throws WildcardLoadError if the directory does not exist
   */
  constructor(baseDir: string) {
    this.baseDir = resolve(baseDir);

    if (!existsSync(this.baseDir) || !statSync(this.baseDir).isDirectory()) {
      throw new WildcardLoadError(
        this.baseDir,
        `Wildcard directory does not exist: ${this.baseDir}`
      );
    }
  }

  resolve(name: string): readonly string[] {
    if (isGlob(name)) {
      return resolveGlob(name, this.listWildcards(), (match) => this.load(match));
    }
    return this.load(name);
  }

  /**
   * Names of all collections, sorted. Subdirectories are traversed.
   */
  listWildcards(): string[] {
    if (this.names === undefined) {
      this.names = this.scan(this.baseDir).sort();
    }
    return [...this.names];
  }

  clearCache(): void {
    this.cache.clear();
    this.names = undefined;
  }

  private scan(dir: string): string[] {
    const names: string[] = [];
    for (const entry of readdirSync(dir)) {
      const fullPath = join(dir, entry);
      if (statSync(fullPath).isDirectory()) {
        names.push(...this.scan(fullPath));
      } else if (entry.toLowerCase().endsWith(WILDCARD_EXTENSION)) {
        names.push(
          relative(this.baseDir, fullPath)
            .slice(0, -WILDCARD_EXTENSION.length)
            .split(sep)
            .join("/")
        );
      }
    }
    return names;
  }

  /**
   * Values of one collection; empty for unknown names and names that
   * point outside the base directory.
   *
   * @throws WildcardLoadError if the file exists but cannot be read
   */
  private load(name: string): readonly string[] {
    const cached = this.cache.get(name);
    if (cached) return cached;

    const filePath = resolve(this.baseDir, `${name}${WILDCARD_EXTENSION}`);
    let values: readonly string[] = [];

    if (filePath.startsWith(this.baseDir + sep) && existsSync(filePath)) {
      try {
        values = Object.freeze(parseWildcardFile(readFileSync(filePath, "utf-8")));
      } catch (err) {
        throw new WildcardLoadError(
          filePath,
          `Failed to read wildcard file ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
          { cause: err }
        );
      }
    }

    this.cache.set(name, values);
    return values;
  }
}
