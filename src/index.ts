import dotenv from "dotenv";
import { createApp } from "./app";
import { OuiDatabase } from "./services/oui-database";

// Load environment variables from .env
dotenv.config();

const PORT = parseInt(process.env.PORT || "3001", 10);
const OUI_CSV_PATH = process.env.OUI_CSV_PATH;

async function main() {
  const database = OUI_CSV_PATH
    ? await OuiDatabase.fromCsvFile(OUI_CSV_PATH)
    : await OuiDatabase.default();

  const stats = database.getStats();
  console.log(
    `Loaded OUI database from ${OUI_CSV_PATH || OuiDatabase.DEFAULT_CSV_PATH}: ${stats.totalRecords} records, ${stats.totalManufacturers} manufacturers`
  );

  const app = createApp(database);

  // Start the server
  const server = app.listen(PORT, () => {
    console.log(`Server is running on port ${PORT}`);
    console.log(`API endpoints:`);
    console.log(`- GET http://localhost:${PORT}/api/oui?mac={mac_address}`);
    console.log(`- GET http://localhost:${PORT}/api/oui/manufacturer?name={name}`);
    console.log(`- GET http://localhost:${PORT}/api/oui/manufacturers`);
    console.log(`- GET http://localhost:${PORT}/api/oui/stats`);
    console.log(`- GET http://localhost:${PORT}/health`);
  });

  // Clean shutdown function
  const shutdown = () => {
    console.log("Shutting down gracefully...");
    server.close((err) => {
      if (err) {
        console.error("Error during shutdown:", err);
        process.exit(1);
      }
      process.exit(0);
    });
  };

  // Listen for termination signals to close connections
  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);
}

main().catch((err) => {
  console.error("Failed to load OUI database:", err);
  process.exit(1);
});
