/**
 * Print database totals and a sample of manufacturer names
 *
 * Usage: npm run db-stats -- [--file oui.csv]
 */
import { errorMessage, loadDatabase, LogFn, parseArgs } from "./cli-helper";

const SAMPLE_SIZE = 20;

export async function run(argv: string[], log: LogFn = console.log): Promise<number> {
  const args = parseArgs(argv);

  if (args.help) {
    log("Usage: db-stats [--file <oui.csv>]");
    return 0;
  }

  try {
    const database = await loadDatabase(args);
    const stats = database.getStats();
    const manufacturers = database.getUniqueManufacturers().sort();

    log(`Total Records= ${stats.totalRecords}`);
    log(`Total Manufacturers= ${stats.totalManufacturers}`);
    log(`Total MAC Addrs= ${stats.totalOuis}`);
    log("");
    log("====Manufacturers====");
    log(JSON.stringify(manufacturers.slice(0, SAMPLE_SIZE), null, 2));
    log("...");
    log(
      JSON.stringify(manufacturers.slice().reverse().slice(0, SAMPLE_SIZE), null, 2)
    );
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
