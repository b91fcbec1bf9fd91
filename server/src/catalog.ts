import fs from "node:fs";
import path from "node:path";
import { InvalidInputError, NotFoundError } from "@scriptrunner/shared";

const SAFE_NAME = /^[a-zA-Z0-9_.-]+\.(py|sh)$/;
const REPO_ID = /^repo-[a-f0-9]{8}$/;
const RUNNABLE = new Set([".py", ".sh"]);

function isInside(base: string, target: string): boolean {
  const rel = path.relative(base, target);
  return rel !== "" && !rel.startsWith("..") && !path.isAbsolute(rel);
}

function isFile(p: string): boolean {
  try {
    return fs.statSync(p).isFile();
  } catch {
    return false;
  }
}

function isDir(p: string): boolean {
  try {
    return fs.statSync(p).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Locates runnable scripts: flat files in the scripts directory, and files
 * inside cloned repositories. Everything returned is an existing file
 * contained in its base directory.
 */
export class ScriptCatalog {
  constructor(
    readonly scriptsDir: string,
    readonly reposDir: string
  ) {}

  listScripts(): string[] {
    if (!isDir(this.scriptsDir)) return [];
    return fs
      .readdirSync(this.scriptsDir, { withFileTypes: true })
      .filter((e) => e.isFile() && !e.name.startsWith("_") && RUNNABLE.has(path.extname(e.name)))
      .map((e) => e.name)
      .sort();
  }

  resolveScript(name: string): string | undefined {
    if (!SAFE_NAME.test(name)) return undefined;
    const p = path.resolve(this.scriptsDir, name);
    if (!isInside(this.scriptsDir, p) || !isFile(p)) return undefined;
    return p;
  }

  deleteScript(name: string): void {
    if (!SAFE_NAME.test(name)) throw new InvalidInputError("Invalid filename");
    const p = this.resolveScript(name);
    if (!p) throw new NotFoundError("Not found");
    fs.unlinkSync(p);
  }

  /** Path a repository with this id lives at, whether or not it exists yet. */
  repoPath(repoId: string): string | undefined {
    if (!REPO_ID.test(repoId)) return undefined;
    const p = path.resolve(this.reposDir, repoId);
    return isInside(this.reposDir, p) ? p : undefined;
  }

  resolveRepoDir(repoId: string): string | undefined {
    const p = this.repoPath(repoId);
    return p && isDir(p) ? p : undefined;
  }

  listRepos(): string[] {
    if (!isDir(this.reposDir)) return [];
    return fs
      .readdirSync(this.reposDir, { withFileTypes: true })
      .filter((e) => e.isDirectory() && REPO_ID.test(e.name))
      .map((e) => e.name)
      .sort();
  }

  resolveRepoFile(repoId: string, relPath: string): string | undefined {
    const base = this.resolveRepoDir(repoId);
    if (!base) return undefined;
    if (!relPath || relPath.includes("..") || relPath.startsWith("/") || relPath.startsWith("\\")) {
      return undefined;
    }

    const target = path.resolve(base, relPath);
    if (!isInside(base, target) || !isFile(target)) return undefined;
    if (!RUNNABLE.has(path.extname(target))) return undefined;
    return target;
  }

  listRepoFiles(repoId: string): string[] {
    const base = this.resolveRepoDir(repoId);
    if (!base) throw new NotFoundError("repo not found");

    const files: string[] = [];
    const walk = (dir: string) => {
      for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
        if (entry.name.startsWith(".")) continue;
        const full = path.join(dir, entry.name);
        if (entry.isDirectory()) {
          walk(full);
        } else if (entry.isFile() && RUNNABLE.has(path.extname(entry.name))) {
          files.push(path.relative(base, full));
        }
      }
    };
    walk(base);
    return files.sort();
  }
}
