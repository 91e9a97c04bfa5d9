import fs from "node:fs/promises";
import type { FolderRepository } from "../ports/folder-repository";

function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

export class NodeFolderRepository implements FolderRepository {
  async exists(absolutePath: string): Promise<boolean> {
    try {
      await fs.lstat(absolutePath);
      return true;
    } catch (err) {
      if (errorCode(err) === "ENOENT") return false;
      throw err;
    }
  }

  async move(fromPath: string, toPath: string): Promise<void> {
    try {
      await fs.rename(fromPath, toPath);
    } catch (err) {
      // rename cannot cross devices; copy then remove instead
      if (errorCode(err) !== "EXDEV") throw err;

      await fs.copyFile(fromPath, toPath, fs.constants.COPYFILE_EXCL);
      try {
        await fs.rm(fromPath);
      } catch (rmErr) {
        // the source is still there, so the copy goes
        await fs.rm(toPath, { force: true });
        throw rmErr;
      }
    }
  }

  async ensureDir(absolutePath: string): Promise<void> {
    await fs.mkdir(absolutePath, { recursive: true });
  }
}
