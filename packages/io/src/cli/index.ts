/**
 * CLI Module
 */

export { createProgram, describeGraph } from './program'
export type { CliDeps } from './program'
export {
  groupSpecSchema,
  linkOptionsSchema,
  unlinkOptionsSchema,
  parseOptions,
  resolveGroups,
} from './options'
export type { GroupSpec, LinkCommandOptions, UnlinkCommandOptions } from './options'
