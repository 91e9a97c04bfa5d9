import type { VersionedFile } from './versioned-file';

export interface ArchivedBaseFile extends VersionedFile {
  path: string;
}

export interface Promotion {
  folder: string;
  incomingPath: string;
  incomingFilename: string;
  baseFilename: string;
  basePath: string;

  // absent when there was no incumbent base file
  archived?: ArchivedBaseFile;
}
