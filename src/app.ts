import express from "express";
import { createOuiRoutes } from "./routes/oui-routes";
import { OuiDatabase } from "./services/oui-database";

export function createApp(database: OuiDatabase): express.Express {
  const app = express();

  // Middleware
  app.use(express.json());

  // Routes
  app.use("/api/oui", createOuiRoutes(database));

  // Health check endpoint
  app.get("/health", (req, res) => {
    res.status(200).json({ status: "UP" });
  });

  // Error handling middleware
  app.use(
    (
      err: Error,
      req: express.Request,
      res: express.Response,
      next: express.NextFunction
    ) => {
      console.error(err.stack);
      res.status(500).json({ error: "Internal Server Error" });
    }
  );

  return app;
}

export default createApp;
