import path from "node:path";
import type { ArchivedBaseFile, Promotion } from "@file-versioner/core-domain";
import type { FolderRepository } from "../ports/folder-repository";
import type { Logger } from "../ports/logger";
import type { Clock } from "../ports/clock";
import { systemClock } from "../ports/clock";
import { FileOperationError, VersionNameExhaustedError } from "../application/errors";
import { buildVersionedFilename, formatDateStamp } from "./version-naming";

export const DEFAULT_MAX_VERSION_ATTEMPTS = 1000;

export type VersioningEngineOptions = {
  repository: FolderRepository;
  logger: Logger;
  clock?: Clock;
  maxVersionAttempts?: number;
};

/**
 * Archives the current base file under a dated name, then moves the incoming
 * variant into the base slot. The archive step always runs first so the old
 * content is never overwritten.
 */
export class VersioningEngine {
  private readonly repository: FolderRepository;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly maxVersionAttempts: number;

  constructor(options: VersioningEngineOptions) {
    this.repository = options.repository;
    this.logger = options.logger;
    this.clock = options.clock ?? systemClock;
    this.maxVersionAttempts = options.maxVersionAttempts ?? DEFAULT_MAX_VERSION_ATTEMPTS;
  }

  async promote(
    folder: string,
    incomingPath: string,
    incomingFilename: string,
    baseFilename: string
  ): Promise<Promotion> {
    const basePath = path.join(folder, baseFilename);
    const promotion: Promotion = { folder, incomingPath, incomingFilename, baseFilename, basePath };

    if (await this.exists(basePath)) {
      const archived = await this.nextVersionedFile(folder, baseFilename);
      await this.move(basePath, archived.path);
      this.logger.info(`Versioned: ${baseFilename} → ${archived.filename}`, {
        folder,
        from: basePath,
        to: archived.path,
      });
      promotion.archived = archived;
    }

    await this.move(incomingPath, basePath);
    this.logger.info(`Updated: ${incomingFilename} → ${baseFilename}`, {
      folder,
      from: incomingPath,
      to: basePath,
    });

    return promotion;
  }

  /** Tries `name_vDATE.ext`, then `name_vDATE_1.ext`, `_2`, ... for a free slot. */
  async nextVersionedFile(folder: string, baseFilename: string): Promise<ArchivedBaseFile> {
    const dateStamp = formatDateStamp(this.clock.now());

    for (let attempt = 0; attempt <= this.maxVersionAttempts; attempt++) {
      const counter = attempt === 0 ? undefined : attempt;
      const filename = buildVersionedFilename(baseFilename, dateStamp, counter);
      const candidate = path.join(folder, filename);

      if (!(await this.exists(candidate))) {
        return { baseFilename, filename, dateStamp, counter, path: candidate };
      }
    }

    throw new VersionNameExhaustedError(baseFilename, this.maxVersionAttempts + 1);
  }

  private async exists(absPath: string): Promise<boolean> {
    try {
      return await this.repository.exists(absPath);
    } catch (err) {
      throw new FileOperationError(`Could not stat ${absPath}`, absPath, err);
    }
  }

  private async move(fromPath: string, toPath: string): Promise<void> {
    try {
      await this.repository.move(fromPath, toPath);
    } catch (err) {
      throw new FileOperationError(`Could not move ${fromPath} to ${toPath}`, fromPath, err);
    }
  }
}
