import type { Command } from 'commander'

/**
 * Options every command accepts
 */
export function addCommonOptions(cmd: Command): Command {
  return cmd
    .option('-c, --config <path>', 'Config file (YAML or JSON)')
    .option('-d, --dictionary <path>', 'Skill dictionary file (JSON or YAML)')
    .option('--log-dir <dir>', 'Write a JSON-lines log to this directory')
}
