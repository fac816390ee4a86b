/** Build and install directories, reused across runs. */
export interface BuildLayout {
  /** Install prefix handed to CMake. */
  installDirectory: string

  /** CMake binary directory. */
  buildDirectory: string
}
