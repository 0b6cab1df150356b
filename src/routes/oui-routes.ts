import { Router } from "express";
import { createOuiController } from "../controllers/oui-controller";
import { OuiDatabase } from "../services/oui-database";

/**
 * Create the /api/oui router for a loaded database
 */
export function createOuiRoutes(database: OuiDatabase): Router {
  const router = Router();
  const ouiController = createOuiController(database);

  // GET /api/oui?mac=xx:xx:xx:xx:xx:xx
  router.get("/", ouiController.lookupByMac);

  // GET /api/oui/manufacturer?name=...
  router.get("/manufacturer", ouiController.lookupByManufacturer);

  router.get("/manufacturers", ouiController.manufacturers);
  router.get("/stats", ouiController.stats);

  return router;
}
