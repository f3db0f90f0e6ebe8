import express, { Application } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import pinoHttp from 'pino-http';
import { config } from './config';
import { Engine } from './engine';
import { createRoutes } from './routes';
import { errorHandler, notFoundHandler } from './middleware/error.middleware';
import { logger } from './utils/logger';

export interface AppOptions {
  /** Off in tests so that request counts do not leak between cases */
  rateLimit?: boolean;
}

class App {
  public app: Application;

  constructor(
    private readonly engine: Engine,
    private readonly options: AppOptions = {}
  ) {
    this.app = express();
    this.initializeMiddleware();
    this.initializeRoutes();
    this.initializeErrorHandling();
  }

  private initializeMiddleware(): void {
    // Security middleware
    this.app.use(helmet());

    // CORS
    this.app.use(
      cors({
        origin: config.cors.allowedOrigins,
        credentials: true,
      })
    );

    // Rate limiting
    if (this.options.rateLimit ?? true) {
      const limiter = rateLimit({
        windowMs: config.rateLimit.windowMs,
        max: config.rateLimit.maxRequests,
        message: 'Too many requests from this IP, please try again later.',
      });
      this.app.use(limiter);
    }

    // Request logging
    this.app.use(
      pinoHttp({
        logger,
        customLogLevel: (req, res, err) => {
          if (res.statusCode >= 400 && res.statusCode < 500) return 'warn';
          if (res.statusCode >= 500 || err) return 'error';
          return 'info';
        },
        customSuccessMessage: (req, res) => `${req.method} ${req.url} ${res.statusCode}`,
        customErrorMessage: (req, res, err) => `${req.method} ${req.url} ${res.statusCode} - Error: ${err.message}`,
        redact: {
          paths: ['req.headers.authorization', 'req.headers.cookie', 'res.headers["set-cookie"]'],
          censor: '[REDACTED]',
        },
      })
    );

    // Body parsing
    this.app.use(express.json());
    this.app.use(express.urlencoded({ extended: true }));
  }

  private initializeRoutes(): void {
    this.app.use('/api/v1', createRoutes(this.engine));

    this.app.get('/', (req, res) => {
      res.json({
        message: 'Insurance Decision Engine API',
        version: '1.0.0',
        endpoints: {
          health: '/api/v1/health',
          quotes: '/api/v1/quotes',
          claims: '/api/v1/claims',
          applications: '/api/v1/applications',
        },
      });
    });
  }

  private initializeErrorHandling(): void {
    // 404 handler
    this.app.use(notFoundHandler);

    // Global error handler
    this.app.use(errorHandler);
  }

  public listen(): void {
    this.app.listen(config.port, () => {
      logger.info({ port: config.port, environment: config.nodeEnv }, 'Decision engine API started');
    });
  }
}

export default App;
