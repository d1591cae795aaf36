/**
 * Help text for the vcluster CLI.
 */

export const MAIN_HELP = `
vcluster - virtual cluster inventory generator

USAGE:
  vcluster <command> [options]

COMMANDS:
  generate    Assign roles to node addresses and write the inventory
  help        Show this help message
  version     Show version information

OPTIONS:
  --help, -h     Show help for a command
  --version, -v  Show version information

EXAMPLES:
  vcluster generate 10.0.0.1 10.0.0.2 10.0.0.3
  vcluster generate --name lab --output ~/inventories/lab 10.0.0.1
`;

export const GENERATE_HELP = `
USAGE: vcluster generate [options] <address> [<address> ...]

Assigns every address to the cluster roles, writes one variable file per
node to <output>/host_vars/<node> and prints the group membership listing.

OPTIONS:
  --name, -n <name>         Cluster name, node names are <name><index> (default: vcluster)
  --output, -o <dir>        Output root (default: current directory)
  --inventory, -i <file>    Also write the membership listing to <file>
  --config, -c <file>       Config file (default: ./vcluster.toml when present)
  --debug                   Emit debug log events

ENVIRONMENT:
  VCLUSTER_NAME, VCLUSTER_OUTPUT_ROOT, VCLUSTER_OUTPUT_INVENTORY, VCLUSTER_DEBUG

EXAMPLES:
  vcluster generate 10.0.0.1
  vcluster generate -n foo -o /srv/ansible 10.0.0.1 10.0.0.2 > /srv/ansible/hosts
`;

const COMMAND_HELP: ReadonlyMap<string, string> = new Map([['generate', GENERATE_HELP]]);

/**
 * Returns help text for a command, or undefined for unknown commands.
 */
export function getCommandHelp(commandName: string): string | undefined {
  return COMMAND_HELP.get(commandName);
}
