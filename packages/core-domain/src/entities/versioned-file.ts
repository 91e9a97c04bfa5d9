export interface VersionedFile {
  baseFilename: string;
  filename: string;
  /** Local calendar date, YYYY-MM-DD. */
  dateStamp: string;
  /** Collision counter; absent for the first version of the day. */
  counter?: number;
}
