import { onRequest } from 'firebase-functions/v2/https';
import * as admin from 'firebase-admin';
import * as functions from 'firebase-functions';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { actionableStepsRouter } from './routes/actionableSteps';
import { errorHandler } from './middlewares/errorHandler';
import { apiLimiter } from './middlewares/rateLimit';
import { corsConfig } from './config';
import { initSentry, setupSentryErrorHandler } from './utils/sentry';
export { processNoteTrigger } from './triggers/processNote';

// Initialize Sentry before anything else
initSentry();

// Initialize Firebase Admin
admin.initializeApp();

const app = express();

app.set('trust proxy', true);

const allowedOrigins = corsConfig.allowedOrigins
  ? corsConfig.allowedOrigins.split(',').map(origin => origin.trim()).filter(Boolean)
  : [];

const devOrigins = corsConfig.isDevelopment
  ? ['http://localhost:3000', 'http://localhost:19006', 'http://localhost:8081']
  : [];

const allAllowedOrigins = [...allowedOrigins, ...devOrigins];

if (allAllowedOrigins.length === 0) {
  functions.logger.warn(
    '[cors] No ALLOWED_ORIGINS configured. API will reject all CORS requests from browsers. ' +
    'Set ALLOWED_ORIGINS environment variable with comma-separated origins.'
  );
}

app.use(cors({
  origin: (origin, callback) => {
    // Server-to-server and caregiver device requests carry no origin
    if (!origin) {
      return callback(null, true);
    }

    if (allAllowedOrigins.includes(origin)) {
      callback(null, true);
      return;
    }

    functions.logger.warn(`[cors] Rejected request from unauthorized origin: ${origin}`);
    callback(new Error(`Origin ${origin} not allowed by CORS policy`));
  },
  methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization'],
}));

app.use(helmet({
  contentSecurityPolicy: {
    directives: {
      defaultSrc: ["'none'"],
      frameAncestors: ["'none'"],
    },
  },
  hsts: {
    maxAge: 31536000,
    includeSubDomains: true,
  },
  frameguard: {
    action: 'deny',
  },
  noSniff: true,
  hidePoweredBy: true,
  referrerPolicy: {
    policy: 'no-referrer',
  },
}));

app.use(express.json({ limit: '1mb' }));

app.use(apiLimiter);

// Routes
app.use('/v1/notes', actionableStepsRouter);

app.get('/health', (req, res) => {
  res.json({ status: 'ok', timestamp: new Date().toISOString() });
});

// Sentry error handler must come before the custom error handler
setupSentryErrorHandler(app);

app.use(errorHandler);

export const api = onRequest(
  {
    timeoutSeconds: 60,
    memory: '256MiB',
    maxInstances: 20,
  },
  app
);
