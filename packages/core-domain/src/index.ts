export type { BaseFileSpec, WatchFolder } from './entities/watch-folder';
export type { VariantKind, VariantPattern } from './entities/variant-pattern';
export type { VersionedFile } from './entities/versioned-file';
export type { ArchivedBaseFile, Promotion } from './entities/promotion';
