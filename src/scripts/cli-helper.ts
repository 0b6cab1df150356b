import path from "path";
import { OuiDatabase } from "../services/oui-database";

export interface CliArgs {
  file?: string;
  help: boolean;
  positional: string[];
}

export type LogFn = (line: string) => void;

// Parse command line arguments (without the node and script entries)
export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { help: false, positional: [] };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "--help" || arg === "-h") {
      args.help = true;
      continue;
    }

    if (arg === "--file" || arg === "-f") {
      args.file = argv[++i];
      continue;
    }

    args.positional.push(arg);
  }

  return args;
}

/**
 * Load the database named by --file, or the bundled default
 */
export function loadDatabase(args: CliArgs): Promise<OuiDatabase> {
  if (!args.file) {
    return OuiDatabase.default();
  }

  // Resolve path if not absolute
  const file = path.isAbsolute(args.file)
    ? args.file
    : path.resolve(process.cwd(), args.file);
  return OuiDatabase.fromCsvFile(file);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
