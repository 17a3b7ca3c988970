import express, { type Request, type Response, type NextFunction } from "express";
import { createServer } from "http";
import { config, validateEnvironment } from "./config";
import { describeError } from "./services/errors";
import { log } from "./log";

const app = express();
app.use(express.json());
app.use(express.urlencoded({ extended: false }));

app.use((req, res, next) => {
  const start = Date.now();
  const path = req.path;
  let capturedJsonResponse: unknown = undefined;

  const originalResJson = res.json;
  res.json = function (bodyJson) {
    capturedJsonResponse = bodyJson;
    return originalResJson.call(res, bodyJson);
  };

  res.on("finish", () => {
    const duration = Date.now() - start;
    if (path.startsWith("/api")) {
      let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
      // Response bodies stay out of production logs
      if (capturedJsonResponse !== undefined && config.nodeEnv !== 'production') {
        logLine += ` :: ${JSON.stringify(capturedJsonResponse)}`;
      }

      if (logLine.length > 80) {
        logLine = logLine.slice(0, 79) + "…";
      }

      log(logLine);
    }
  });

  next();
});

process.on('unhandledRejection', (reason, promise) => {
  console.error('Unhandled Rejection at:', promise, 'reason:', reason);
  process.exit(1);
});

process.on('uncaughtException', (error) => {
  console.error('Uncaught Exception:', error);
  process.exit(1);
});

function errorStatus(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return 500;
}

void (async () => {
  try {
    log('Starting server initialization...');
    log(`🔍 Environment: ${config.nodeEnv}`);
    log(`  - Port: ${config.port}`);

    const envValid = validateEnvironment(config);

    // Health check works even when route registration fails
    app.get('/api/healthz', (_req, res) => {
      res.status(200).json({ status: 'ok', database: envValid, timestamp: new Date().toISOString() });
    });

    log('Registering routes...');
    try {
      const { registerRoutes } = await import('./routes');
      await registerRoutes(app);
      log('Routes registered successfully');
    } catch (routeError) {
      log(`⚠️ Route registration failed: ${describeError(routeError)}`);
      log('Server will continue with health endpoints only');
    }

    app.use('/api', (req, res) => {
      res.status(404).json({ message: "API endpoint not found", path: req.path });
    });

    app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
      const status = errorStatus(err);
      const message = err instanceof Error && err.message ? err.message : "Internal Server Error";

      log(`Error handled: ${status} - ${message}`);
      res.status(status).json({ message });
    });

    const server = createServer(app);

    await new Promise<void>((resolve, reject) => {
      server.listen(config.port, "0.0.0.0", () => {
        log(`✅ Server successfully bound to port ${config.port}`);
        log(`Process ID: ${process.pid}`);
        resolve();
      });

      server.on('error', (error: NodeJS.ErrnoException) => {
        log(`❌ Server binding error: ${error.message}`);
        if (error.code === 'EADDRINUSE') {
          log(`Port ${config.port} is already in use`);
        }
        reject(error);
      });
    });

    const gracefulShutdown = (signal: string) => {
      log(`Received ${signal}, shutting down gracefully...`);
      server.close(() => {
        log('Server closed');
        process.exit(0);
      });
    };

    process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => gracefulShutdown('SIGINT'));
  } catch (error) {
    log(`❌ Failed to start server: ${describeError(error)}`);
    process.exit(1);
  }
})();
