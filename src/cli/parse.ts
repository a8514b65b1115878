export type Command = "ingest" | "ask" | "search";

const COMMANDS: readonly Command[] = ["ingest", "ask", "search"];

export const USAGE = "Usage: siteqa <ingest|ask|search> [...]";

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((c) => c === value);
}

export function parseCli(argv: string[]): { command: Command; args: string[] } {
  const [, , command, ...rest] = argv;
  if (!isCommand(command)) {
    throw new Error(USAGE);
  }
  return { command, args: rest };
}
