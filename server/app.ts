import { type Server } from "node:http";

import express, {
  type Express,
  type NextFunction,
  type Request,
  type Response,
} from "express";
import cookieParser from "cookie-parser";

import { registerRoutes, type RouteDependencies } from "./routes";
import { attachUserIdentity, createAuthRouter } from "./auth";
import { generalApiLimiter } from "./middleware/rateLimiter";
import { logInfo, logError, getLogger } from "./utils/logger";

const logger = getLogger();

function readErrorStatus(err: unknown): number {
  if (typeof err === "object" && err !== null) {
    const status = Reflect.get(err, "status") ?? Reflect.get(err, "statusCode");
    if (typeof status === "number" && status >= 400 && status < 600) {
      return status;
    }
  }
  return 500;
}

export async function createApp(deps: RouteDependencies): Promise<{ app: Express; server: Server }> {
  const app = express();

  // Trust proxy for accurate IP detection behind reverse proxies.
  // Required for rate limiting to key on the client address.
  app.set("trust proxy", 1);

  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));
  app.use(cookieParser());

  app.use(attachUserIdentity(deps.storage));

  // Request logging middleware using pino
  app.use((req, res, next) => {
    const start = Date.now();
    const reqPath = req.path;

    res.on("finish", () => {
      const duration = Date.now() - start;
      if (reqPath.startsWith("/api")) {
        logger.info({
          method: req.method,
          path: reqPath,
          statusCode: res.statusCode,
          durationMs: duration,
        }, "api_request");
      }
    });

    next();
  });

  app.use("/api", generalApiLimiter);
  app.use("/api/auth", createAuthRouter(deps.storage));

  const server = await registerRoutes(app, deps);

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = readErrorStatus(err);
    const message = err instanceof Error && err.message ? err.message : "Internal Server Error";

    // Log the error but don't throw it - that causes connection issues
    logError("server_error", {
      statusCode: status,
      message,
      stack: err instanceof Error ? err.stack : undefined,
    });
    res.status(status).json({ message });
  });

  return { app, server };
}

export function listen(server: Server, port: number, host = "0.0.0.0"): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen({ port, host }, () => {
      server.off("error", reject);
      logInfo("server_started", { port, host });
      resolve();
    });
  });
}
