import express from "express";
import { GeoController } from "./controllers/geo-controller";
import { createGeoRoutes } from "./routes/geo-routes";
import { GeoService } from "./services/geo-service";
import { SnapshotManager } from "./services/snapshot-manager";
import {
  GeoError,
  InvalidHostError,
  clientErrorStatus,
  errorMessage,
} from "./models/errors";

export interface AppDeps {
  geoService: GeoService;
  snapshots: Pick<SnapshotManager, "current" | "isReady">;
  trustProxyHeaders: boolean;
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();

  // Middleware
  app.use(express.json());

  // Health check endpoint, registered before /:host
  app.get("/health", (req, res) => {
    if (!deps.snapshots.isReady()) {
      res.status(503).json({ status: "DOWN", database: null });
      return;
    }
    const snapshot = deps.snapshots.current();
    res.status(200).json({
      status: "UP",
      database: {
        generation: snapshot.generation,
        loaded_at: snapshot.loadedAt.toISOString(),
      },
    });
  });

  // Routes
  const controller = new GeoController(deps.geoService, {
    trustProxyHeaders: deps.trustProxyHeaders,
  });
  app.use(createGeoRoutes(controller));

  // Error handling middleware
  app.use(
    (
      err: unknown,
      req: express.Request,
      res: express.Response,
      // Express recognizes error handlers by their four parameters
      next: express.NextFunction
    ) => {
      const error = toGeoError(err, req);
      if (error) {
        res.status(error.status).json({
          code: error.status,
          error: error.code,
          message: error.message,
        });
        return;
      }

      console.error("Unhandled error:", err);
      res.status(500).json({
        code: 500,
        error: "INTERNAL_ERROR",
        message: "Internal Server Error",
      });
    }
  );

  return app;
}

/**
 * Client errors raised by Express itself, such as a path parameter with
 * broken percent-encoding, are reported against the raw last path segment
 */
function toGeoError(err: unknown, req: express.Request): GeoError | null {
  if (err instanceof GeoError) return err;
  if (clientErrorStatus(err) === null) return null;

  const segment = req.path.slice(req.path.lastIndexOf("/") + 1);
  const reason =
    err instanceof URIError ? "malformed percent-encoding" : errorMessage(err);
  return new InvalidHostError(segment, reason);
}
