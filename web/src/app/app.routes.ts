// web/src/app/app.routes.ts
import { Router, type Request, type RequestHandler, type Response } from 'express';
import { z } from 'zod';
import { CADENCES } from '@streakboard/data-models';
import { AppError, ValidationError } from './errors';
import { HabitService } from './habit.service';
import type { Flash } from './components/layout';
import { renderHabitsPage } from './pages/habits/habits.page';
import { renderLoginPage } from './pages/login/login.page';
import { renderRegisterPage } from './pages/register/register.page';
import type { AuthService } from './services/auth.service';
import {
  clearSessionCookie,
  requireSession,
  sessionOf,
  setSessionCookie,
  type CookieSettings,
} from './services/session';
import type { HabitStore } from './services/store';

export interface RouteDeps {
  auth: AuthService;
  habits: HabitStore;
  /** Liefert „jetzt“ – in Tests fest */
  clock: () => Date;
  cookies: CookieSettings;
}

// ====== Formulare ======
const addHabitForm = z.object({
  name: z.string().default(''),
  cadence: z.enum(CADENCES, { errorMap: () => ({ message: 'Please choose daily, weekly or monthly.' }) }).default('daily'),
});
const habitNameForm = z.object({ name: z.string().min(1, 'Please choose a habit.') });
/** Felder, die nach einem Fehler wieder ins Formular kommen (nie das Passwort) */
const echoForm = z.object({ username: z.string(), accessCode: z.string() }).partial();

function parseForm<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues[0].message);
  }
  return parsed.data;
}

function echo(req: Request): z.infer<typeof echoForm> {
  const parsed = echoForm.safeParse(req.body);
  return parsed.success ? parsed.data : {};
}

/** Fehler, die als Meldung auf der Seite landen; alles ab 500 geht an den Error-Handler */
function isUserFacing(err: unknown): err is AppError {
  return err instanceof AppError && err.status < 500;
}

function flashFrom(req: Request): Flash {
  const { notice, error } = req.query;
  return {
    notice: typeof notice === 'string' ? notice : undefined,
    error: typeof error === 'string' ? error : undefined,
  };
}

function redirectHome(res: Response, flash: Flash = {}): void {
  const params = new URLSearchParams();
  if (flash.notice) params.set('notice', flash.notice);
  if (flash.error) params.set('error', flash.error);
  const query = params.toString();
  res.redirect(303, query ? `/?${query}` : '/');
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/** Express 4 fängt keine Promise-Rejections – weiterreichen an den Error-Handler */
function handle(fn: AsyncHandler): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

/** POST → Redirect (PRG); Nutzerfehler werden zur Flash-Meldung. */
async function mutate(res: Response, action: () => Promise<string | undefined>): Promise<void> {
  try {
    const notice = await action();
    redirectHome(res, { notice });
  } catch (err) {
    if (!isUserFacing(err)) throw err;
    redirectHome(res, { error: err.message });
  }
}

export function createRoutes(deps: RouteDeps): Router {
  const router = Router();
  const serviceFor = (req: Request) => new HabitService(sessionOf(req), deps.habits, deps.clock());

  router.get('/healthz', (_req, res) => {
    res.json({ status: 'ok' });
  });

  // ======= Auth =======

  router.get('/login', (req, res) => {
    if (req.session) return res.redirect(303, '/');
    res.send(renderLoginPage(flashFrom(req)));
  });

  router.post(
    '/login',
    handle(async (req, res) => {
      try {
        const session = await deps.auth.login(req.body);
        setSessionCookie(res, deps.auth.issueToken(session), deps.cookies);
        res.redirect(303, '/');
      } catch (err) {
        if (!isUserFacing(err)) throw err;
        res.status(err.status).send(renderLoginPage({ error: err.message, username: echo(req).username }));
      }
    })
  );

  router.get('/register', (req, res) => {
    if (req.session) return res.redirect(303, '/');
    res.send(renderRegisterPage(flashFrom(req)));
  });

  router.post(
    '/register',
    handle(async (req, res) => {
      try {
        const session = await deps.auth.register(req.body);
        setSessionCookie(res, deps.auth.issueToken(session), deps.cookies);
        redirectHome(res, { notice: `Welcome, ${session.username}!` });
      } catch (err) {
        if (!isUserFacing(err)) throw err;
        res.status(err.status).send(renderRegisterPage({ error: err.message, ...echo(req) }));
      }
    })
  );

  router.post('/logout', (_req, res) => {
    clearSessionCookie(res, deps.cookies);
    res.redirect(303, '/login');
  });

  // ======= Habits =======

  router.get(
    '/',
    requireSession,
    handle(async (req, res) => {
      const dashboard = await serviceFor(req).dashboard();
      res.send(renderHabitsPage(dashboard, flashFrom(req)));
    })
  );

  router.post(
    '/habits',
    requireSession,
    handle((req, res) =>
      mutate(res, async () => {
        const form = parseForm(addHabitForm, req.body);
        const habit = await serviceFor(req).addHabit(form.name, form.cadence);
        return `Added '${habit.name}'!`;
      })
    )
  );

  router.post(
    '/habits/delete',
    requireSession,
    handle((req, res) =>
      mutate(res, async () => {
        const { name } = parseForm(habitNameForm, req.body);
        await serviceFor(req).removeHabit(name);
        return `Removed '${name}'!`;
      })
    )
  );

  router.post(
    '/habits/complete',
    requireSession,
    handle((req, res) =>
      mutate(res, async () => {
        const { name } = parseForm(habitNameForm, req.body);
        await serviceFor(req).complete(name);
        return undefined;
      })
    )
  );

  router.post(
    '/habits/undo',
    requireSession,
    handle((req, res) =>
      mutate(res, async () => {
        const { name } = parseForm(habitNameForm, req.body);
        await serviceFor(req).undo(name);
        return undefined;
      })
    )
  );

  return router;
}
