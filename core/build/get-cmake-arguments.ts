/**
 * CMake configuration flags for a release build of every target backend.
 *
 * See https://llvm.org/docs/CMake.html#llvm-specific-variables.
 *
 * @param installDirectory - Install prefix.
 * @param sourceDirectory - Core source tree.
 * @returns Arguments for the configure step.
 */
export function getCmakeArguments(
  installDirectory: string,
  sourceDirectory: string,
): string[] {
  return [
    '-G',
    'Unix Makefiles',
    /* A release build implies LLVM_ENABLE_ASSERTIONS=OFF. */
    '-DCMAKE_BUILD_TYPE=Release',
    `-DCMAKE_INSTALL_PREFIX=${installDirectory}`,
    '-DLLVM_TARGETS_TO_BUILD=all',
    '-DLLVM_INCLUDE_EXAMPLES=OFF',
    '-DLLVM_INCLUDE_TESTS=OFF',
    '-DLLVM_INCLUDE_GO_TESTS=OFF',
    '-DLLVM_INCLUDE_DOCS=OFF',
    '-DLLVM_ENABLE_TERMINFO=OFF',
    '-DLLVM_ENABLE_ZLIB=OFF',
    '-DLLVM_ENABLE_LIBEDIT=OFF',
    '-DLLVM_ENABLE_LIBXML2=OFF',
    sourceDirectory,
  ]
}
