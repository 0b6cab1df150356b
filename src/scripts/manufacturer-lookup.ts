/**
 * List the address blocks registered to a manufacturer
 *
 * Usage: npm run manufacturer-lookup -- "Example Corp" [--file oui.csv]
 */
import { errorMessage, loadDatabase, LogFn, parseArgs } from "./cli-helper";

export async function run(argv: string[], log: LogFn = console.log): Promise<number> {
  const args = parseArgs(argv);
  const name = args.positional[0];

  // An empty name ("") selects the private blocks
  if (args.help || name === undefined) {
    log("pass a manufacturer name for lookup");
    return args.help ? 0 : 1;
  }

  try {
    const database = await loadDatabase(args);
    const records = database.lookupByManufacturer(name);

    if (records) {
      log(JSON.stringify(records, null, 2));
    } else {
      log(`No entry found for: ${name}`);
    }
    return 0;
  } catch (error) {
    log(`Error: ${errorMessage(error)}`);
    return 1;
  }
}

if (require.main === module) {
  run(process.argv.slice(2))
    .then((code) => process.exit(code))
    .catch((error) => {
      console.error("Unhandled error:", error);
      process.exit(1);
    });
}
