import express, { type NextFunction, type Request, type Response } from "express";
import type { Server } from "http";
import type { AppServices } from "./container";
import { requestContext } from "./middleware/requestContext";
import { addSecurityHeaders, validateOrigin } from "./middleware/security";
import { registerRoutes } from "./routes";
import { handleRouteError } from "./utils/errorHandler";

export async function createApp(services: AppServices): Promise<{ app: express.Express; server: Server }> {
  const app = express();
  app.disable("x-powered-by");
  app.use(express.json({ limit: "100kb" }));
  app.use(addSecurityHeaders);
  app.use(requestContext);
  app.use(validateOrigin);

  const server = await registerRoutes(app, services);

  app.use("/api", (_req: Request, res: Response) => {
    res.status(404).json({ error: "Not found" });
  });

  // Errors passed to next(), including malformed JSON bodies
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    handleRouteError(res, error, "Unhandled");
  });

  return { app, server };
}
