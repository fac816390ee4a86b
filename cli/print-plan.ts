import pc from 'picocolors'

/**
 * Prints what a packaging run is about to do.
 *
 * @param plan - Run summary.
 * @param plan.version - Effective version.
 * @param plan.workDirectory - Working directory of the run.
 * @param plan.repository - Release repository as 'owner/repo', null for a dry
 *   run.
 */
export function printPlan(plan: {
  repository: string | null
  workDirectory: string
  version: string
}): void {
  console.info(`Version:    ${pc.yellow(plan.version)}`)
  console.info(`Directory:  ${pc.gray(plan.workDirectory)}`)
  console.info(
    `Release to: ${
      plan.repository ? pc.cyan(plan.repository) : pc.gray('nowhere (dry run)')
    }\n`,
  )
}
