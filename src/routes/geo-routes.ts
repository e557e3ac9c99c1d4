import { Router } from "express";
import { GeoController } from "../controllers/geo-controller";

export function createGeoRoutes(controller: GeoController): Router {
  const router = Router();

  // GET / uses the requesting client's address
  router.get("/", controller.lookupClient);

  // GET /api?host=8.8.8.8 or /api?host=2001%3Adb8%3A%3A1
  router.get("/api", controller.lookupQuery);

  router.get("/api/:host", controller.lookupHost);
  router.get("/:host", controller.lookupHost);

  return router;
}
