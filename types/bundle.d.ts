/** Compressed archive of the installed toolchain. */
export interface Bundle {
  /** Absolute path of the `.tar.xz` file. */
  archivePath: string

  /** Top-level directory inside the archive (e.g. 'clang+llvm-14.0.0-x86_64-unknown-linux-gnu'). */
  name: string
}
