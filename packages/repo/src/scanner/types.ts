export interface WalkOptions {
  /** File extensions to collect, with the leading dot */
  extensions?: string[];
  /** gitignore-style patterns; bare names match a directory or file at any depth */
  excludes?: string[];
  maxFileSize?: number;
}

export interface SourceFileMeta {
  /** Path relative to the walk root, forward slashes */
  path: string;
  absPath: string;
  sizeBytes: number;
  ext: string;
}

export interface SourceFileSet {
  root: string;
  files: SourceFileMeta[];
  warnings: string[];
}
