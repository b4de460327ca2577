import fg from "fast-glob";
import fs from "node:fs/promises";
import path from "node:path";
import { InputError } from "./errors";

/** A stored upload as found on disk. */
export interface StoredUpload {
  ownerId: string;
  filename: string;
  absPath: string;
}

/**
 * Resolve `relPath` against `root` and refuse anything that escapes it.
 * @throws InputError on traversal outside `root`.
 */
export function ensureWithinRoot(root: string, relPath: string): string {
  const abs = path.resolve(root, relPath);
  const normRoot = path.resolve(root) + path.sep;
  if (abs !== path.resolve(root) && !abs.startsWith(normRoot)) {
    throw new InputError(`Path outside ${root}: ${relPath}`);
  }
  return abs;
}

/** Reduce a client-supplied name to a bare file name. */
export function sanitizeFilename(filename: string): string {
  const base = path.basename(filename.replace(/\\/g, "/")).trim();
  if (!base || base === "." || base === ".." || base.includes("\u0000")) {
    throw new InputError(`Invalid filename: ${JSON.stringify(filename)}`);
  }
  return base;
}

/**
 * Raw upload bytes kept on disk as `<root>/<encoded owner>/<filename>`, so a
 * cold start can rebuild the index without the clients re-sending anything.
 */
export class UploadStore {
  public readonly root: string;

  public constructor(root: string) {
    this.root = path.resolve(root);
  }

  public async save(ownerId: string, filename: string, bytes: Uint8Array): Promise<string> {
    const abs = this.pathFor(ownerId, filename);
    await fs.mkdir(path.dirname(abs), { recursive: true });
    // Write then rename so a crash never leaves a truncated upload behind.
    const tmp = `${abs}.${process.pid}.tmp`;
    await fs.writeFile(tmp, bytes);
    await fs.rename(tmp, abs);
    return abs;
  }

  public async read(ownerId: string, filename: string): Promise<Uint8Array> {
    return fs.readFile(this.pathFor(ownerId, filename));
  }

  /** Returns false when there was nothing to remove. */
  public async remove(ownerId: string, filename: string): Promise<boolean> {
    try {
      await fs.unlink(this.pathFor(ownerId, filename));
      return true;
    } catch (e) {
      if (isErrnoException(e) && e.code === "ENOENT") return false;
      throw e;
    }
  }

  /** Every stored upload, ordered by owner then filename. */
  public async list(): Promise<StoredUpload[]> {
    const files = await fg("*/*", { cwd: this.root, onlyFiles: true, dot: true });
    const out: StoredUpload[] = [];
    for (const rel of files) {
      if (rel.endsWith(".tmp")) continue;
      const [ownerDir, filename] = rel.split("/");
      if (!ownerDir || !filename) continue;
      let ownerId: string;
      try {
        ownerId = decodeURIComponent(ownerDir);
      } catch {
        console.error(`[RAG] Skipping upload under undecodable owner directory: ${ownerDir}`);
        continue;
      }
      out.push({ ownerId, filename, absPath: path.join(this.root, ownerDir, filename) });
    }
    out.sort((a, b) => a.ownerId.localeCompare(b.ownerId) || a.filename.localeCompare(b.filename));
    return out;
  }

  private pathFor(ownerId: string, filename: string): string {
    if (!ownerId.trim() || ownerId === "." || ownerId === "..") {
      throw new InputError(`Invalid owner id: ${JSON.stringify(ownerId)}`);
    }
    return ensureWithinRoot(this.root, path.join(encodeURIComponent(ownerId), sanitizeFilename(filename)));
  }
}

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}
