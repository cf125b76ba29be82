// web/src/app/app.ts
import cookieParser from 'cookie-parser';
import express, { type ErrorRequestHandler, type Express } from 'express';
import { createRoutes } from './app.routes';
import type { AppConfig } from './config';
import { AppError, StorageError } from './errors';
import { logger } from './logger';
import { renderErrorPage } from './pages/error/error.page';
import { AuthService } from './services/auth.service';
import { sessionMiddleware } from './services/session';
import type { HabitStore, UserStore } from './services/store';

export interface AppDeps {
  users: UserStore;
  habits: HabitStore;
  session: AppConfig['session'];
  /** „Jetzt“ – injiziert, damit Tests feste Tage haben */
  clock?: () => Date;
  /** bcrypt cost factor; Tests nehmen den kleinsten */
  hashRounds?: number;
}

const onError: ErrorRequestHandler = (err: unknown, req, res, _next) => {
  if (err instanceof StorageError) {
    logger.error(`storage failure in ${err.operation} (${req.method} ${req.path})`, err.reason);
    res.status(err.status).send(renderErrorPage(err.message));
    return;
  }
  if (err instanceof AppError) {
    res.status(err.status).send(renderErrorPage(err.message));
    return;
  }
  logger.error(`unhandled error (${req.method} ${req.path})`, err);
  res.status(500).send(renderErrorPage('Something went wrong. Please try again.'));
};

export function createApp(deps: AppDeps): Express {
  const { secret, ttlSeconds, secureCookie } = deps.session;
  const auth = new AuthService(deps.users, { secret, ttlSeconds, hashRounds: deps.hashRounds });

  const app = express();
  app.disable('x-powered-by');
  app.use(express.urlencoded({ extended: false }));
  app.use(cookieParser());
  app.use(sessionMiddleware(auth));
  app.use(
    createRoutes({
      auth,
      habits: deps.habits,
      clock: deps.clock ?? (() => new Date()),
      cookies: { ttlSeconds, secure: secureCookie },
    })
  );
  app.use((_req, res) => {
    res.status(404).send(renderErrorPage('Page not found.'));
  });
  app.use(onError);
  return app;
}
