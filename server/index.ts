import express, { type NextFunction, type Request, type Response } from "express";
import { loadSettings } from "./config/settings";
import { createAnalysisDeps } from "./analysis";
import { addSecurityHeaders } from "./middleware/security";
import { registerRoutes } from "./routes";
import { storage } from "./storage";
import { handleRouteError } from "./utils/errorHandler";
import { logInfo } from "./utils/logger";

const settings = loadSettings();
const deps = createAnalysisDeps(settings, storage);

const app = express();
app.use(express.json({ limit: "10mb" }));
app.use(addSecurityHeaders);

app.use((req, res, next) => {
  const start = Date.now();
  res.on("finish", () => {
    if (req.path.startsWith("/api")) {
      console.log(`${req.method} ${req.path} ${res.statusCode} in ${Date.now() - start}ms`);
    }
  });
  next();
});

const server = registerRoutes(app, deps);

// Errors forwarded by middleware (validation, body parsing)
app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
  handleRouteError(res, err, "Server");
});

server.listen(settings.port, "0.0.0.0", () => {
  logInfo(`[Server] Listening on port ${settings.port}`, {
    model: settings.defaultModel,
    template: settings.defaultTemplate,
  });
});
