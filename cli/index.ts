import { resolve } from 'node:path'
import pc from 'picocolors'
import cac from 'cac'

import type { Credentials } from '../types/credentials'

import {
  DEFAULT_RELEASE_REPO,
  packageToolchain,
} from '../core/package-toolchain'
import { getEffectiveVersion } from '../core/release/get-effective-version'
import { resolveCredentials } from '../core/config/resolve-credentials'
import { parseReleaseSpec } from '../core/release/parse-release-spec'
import { normalizeReleaseCandidate } from './normalize-release-candidate'
import { version as packageVersion } from '../package.json'
import { printPlan } from './print-plan'

/** CLI Options. */
interface CLIOptions {
  /** Release candidate ordinal. */
  releaseCandidate?: unknown

  /** GitHub token, defaults to GITHUB_TOKEN. */
  ghToken?: unknown

  /** GitHub user name, defaults to GITHUB_USERNAME. */
  ghUser?: unknown

  /** Working directory for sources, build and bundle. */
  workDir?: string

  /** Owner of the release repository, defaults to the user. */
  ghOrg?: unknown

  /** Name of the release repository. */
  repo?: string

  /** Build and bundle without publishing. */
  dryRun?: boolean
}

/**
 * Run the CLI.
 *
 * @param argv - Process arguments, including the node and script paths.
 */
export function run(argv: string[] = process.argv): void {
  let cli = cac('llvm-packager')

  cli
    .help()
    .version(packageVersion)
    .option('--release-candidate <number>', 'LLVM release candidate number')
    .option(
      '--gh-user <user>',
      'GitHub user name (default: environment variable GITHUB_USERNAME)',
    )
    .option(
      '--gh-token <token>',
      'GitHub API token (default: environment variable GITHUB_TOKEN)',
    )
    .option(
      '--gh-org <owner>',
      'Owner of the release repository (default: user name)',
    )
    .option('--repo <name>', 'Release repository', {
      default: DEFAULT_RELEASE_REPO,
    })
    .option('--work-dir <directory>', 'Working directory (default: cwd)')
    .option('--dry-run', 'Build and bundle without publishing')
    .command('<version>', 'Package an LLVM release and publish it on GitHub')
    .action(async (version: unknown, options: CLIOptions) => {
      console.info(pc.cyan('\n📦 LLVM Packager\n'))

      try {
        let release = parseReleaseSpec(
          String(version),
          normalizeReleaseCandidate(options.releaseCandidate),
        )

        let credentials: Credentials | undefined
        if (!options.dryRun) {
          credentials = resolveCredentials({
            ghToken: toOptionalString(options.ghToken),
            ghUser: toOptionalString(options.ghUser),
          })
        }

        let owner = toOptionalString(options.ghOrg) ?? credentials?.userName
        let repo = options.repo ?? DEFAULT_RELEASE_REPO
        let workDirectory = resolve(options.workDir ?? process.cwd())

        printPlan({
          repository: owner && !options.dryRun ? `${owner}/${repo}` : null,
          version: getEffectiveVersion(release),
          workDirectory,
        })

        let result = await packageToolchain({
          dryRun: options.dryRun,
          workDirectory,
          credentials,
          release,
          owner,
          repo,
        })

        if (result.published) {
          console.info(
            pc.green(
              `\n✓ ${result.bundle.name}.tar.xz released as ${result.version}`,
            ),
          )
        }
      } catch (error) {
        printError(error)
        process.exit(1)
      }
    })

  try {
    cli.parse(argv)
  } catch (error) {
    printError(error)
    process.exit(1)
  }
}

function printError(error: unknown): void {
  console.error(
    pc.redBright('\nError:'),
    error instanceof Error ? error.message : String(error),
  )
}

function toOptionalString(value: unknown): undefined | string {
  if (value === undefined || value === null || value === '') {
    return undefined
  }
  return String(value)
}
