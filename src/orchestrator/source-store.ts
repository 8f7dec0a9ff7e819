import { mkdir, readdir, readFile, rm, stat, unlink, writeFile } from "node:fs/promises";
import path from "node:path";
import { InvalidNameError } from "./errors.js";
import { LOG_DIR_NAME } from "./image-unit.js";

/** Image names are directory names: alphanumeric first, then alphanumerics, `_`, `.` or `-`. */
const IMAGE_NAME_RE = /^[a-zA-Z0-9][a-zA-Z0-9_.-]{0,62}$/;

export interface SourceFile {
  name: string;
  size: number;
}

export function isValidImageName(name: string): boolean {
  return IMAGE_NAME_RE.test(name);
}

/** A file name is valid when it names an entry directly inside the image directory. */
export function isValidFileName(name: string): boolean {
  return (
    name.length > 0 &&
    name !== "." &&
    name !== ".." &&
    name !== LOG_DIR_NAME &&
    !name.includes("\0") &&
    path.basename(name) === name &&
    !name.includes("\\")
  );
}

/**
 * The on-disk side of images: one subdirectory of `root` per image, holding
 * the files sent to the builder.
 */
export class SourceStore {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  dirFor(image: string): string {
    if (!isValidImageName(image)) throw new InvalidNameError("image", image);
    return path.join(this.root, image);
  }

  /** Names of the image directories currently under the root. */
  async scan(): Promise<string[]> {
    const entries = await readdir(this.root, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory() && isValidImageName(entry.name))
      .map((entry) => entry.name)
      .sort();
  }

  /** Create an image directory. Rejects with EEXIST when it already exists. */
  async create(image: string): Promise<string> {
    const dir = this.dirFor(image);
    await mkdir(dir, { mode: 0o755 });
    return dir;
  }

  async remove(image: string): Promise<void> {
    await rm(this.dirFor(image), { recursive: true, force: true });
  }

  /** Regular files directly inside the image directory. */
  async listFiles(image: string): Promise<SourceFile[]> {
    const dir = this.dirFor(image);
    const entries = await readdir(dir, { withFileTypes: true });
    const files: SourceFile[] = [];
    for (const entry of entries) {
      if (!entry.isFile()) continue;
      const info = await stat(path.join(dir, entry.name));
      files.push({ name: entry.name, size: info.size });
    }
    return files.sort((a, b) => a.name.localeCompare(b.name));
  }

  filePath(image: string, file: string): string {
    if (!isValidFileName(file)) throw new InvalidNameError("file", file);
    return path.join(this.dirFor(image), file);
  }

  async readFile(image: string, file: string): Promise<Buffer> {
    return readFile(this.filePath(image, file));
  }

  async writeFile(image: string, file: string, data: Uint8Array): Promise<void> {
    await writeFile(this.filePath(image, file), data);
  }

  /** Delete one file. Rejects with ENOENT when it does not exist. */
  async deleteFile(image: string, file: string): Promise<void> {
    await unlink(this.filePath(image, file));
  }
}
