import express, {
  type Request,
  type Response,
  type NextFunction,
} from "express";
import cors from "cors";
import gameRoutes from "./routes/gameRoutes";
import { logger, LogCategory } from "../infrastructure/utils/logger";
import { HttpStatusCode } from "../shared/constants/HttpStatusCodes";
import { CONFIG } from "../config/config";

/**
 * Express application instance.
 *
 * Routes:
 * - `/health` - Health check endpoint
 * - `/api/game` - Current screen, full snapshot, player input
 * - `/api/sim/command` - Simulation commands (pace, time scale, reset)
 *
 * @module application
 */
const app = express();

app.use(
  cors({
    origin: CONFIG.ALLOWED_ORIGINS,
    credentials: true,
  }),
);

app.use(express.json({ limit: "16kb" }));

if (process.env.NODE_ENV !== "production") {
  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.debug(`${req.method} ${req.path}`, LogCategory.HTTP);
    next();
  });
}

app.use("/", gameRoutes);

app.use(
  (err: Error, _req: Request, res: Response, _next: NextFunction): void => {
    const errorMessage =
      process.env.NODE_ENV === "production"
        ? "Internal server error"
        : err.message;
    logger.error("Unhandled error:", LogCategory.HTTP, err.message);
    res
      .status(HttpStatusCode.INTERNAL_SERVER_ERROR)
      .json({ error: errorMessage });
  },
);

app.use((_req: Request, res: Response): void => {
  res.status(HttpStatusCode.NOT_FOUND).json({ error: "Route not found" });
});

export default app;
