/**
 * Look up the vendor of a MAC address
 *
 * Usage: npm run mac-lookup -- 70:B3:D5:E7:4F:81 [--file oui.csv]
 */
import { errorMessage, loadDatabase, LogFn, parseArgs } from "./cli-helper";

export async function run(argv: string[], log: LogFn = console.log): Promise<number> {
  const args = parseArgs(argv);
  const mac = args.positional[0];

  if (args.help || !mac) {
    log("pass a mac address string for lookup");
    return args.help ? 0 : 1;
  }

  try {
    const database = await loadDatabase(args);
    const record = database.lookupByMac(mac);

    if (record) {
      log(JSON.stringify(record, null, 2));
    } else {
      log(`No entry found for: ${mac}`);
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
