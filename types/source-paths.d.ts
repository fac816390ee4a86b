/**
 * Locations of the source archives for a release, both remote and on disk.
 * Directories are absolute, archive names are bare file names.
 */
export interface SourcePaths {
  /** Extracted front-end (clang) source directory. */
  frontEndDirectory: string

  /** Front-end archive file name (e.g. 'cfe-14.0.0.src.tar.xz'). */
  frontEndArchive: string

  /** Extracted core (llvm) source directory. */
  coreDirectory: string

  /** Core archive file name (e.g. 'llvm-14.0.0.src.tar.xz'). */
  coreArchive: string

  /** Directory the archives are downloaded to and extracted in. */
  workDirectory: string

  /** Remote directory both archives are downloaded from. */
  baseUrl: string
}
