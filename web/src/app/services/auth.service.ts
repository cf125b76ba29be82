// web/src/app/services/auth.service.ts
import bcrypt from 'bcryptjs';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { AuthError, ConflictError, ValidationError } from '../errors';
import { logger } from '../logger';
import type { UserStore } from './store';

/** Request-scoped identity; explicitly passed wherever a user is needed. */
export interface SessionContext {
  username: string;
}

export interface AuthOptions {
  secret: string;
  ttlSeconds: number;
  /** bcrypt cost factor */
  hashRounds?: number;
}

const credentialsSchema = z.object({
  username: z
    .string({ required_error: 'Please enter a username.' })
    .trim()
    .min(3, 'Username must be 3–32 characters.')
    .max(32, 'Username must be 3–32 characters.')
    .regex(/^[A-Za-z0-9_.-]+$/, 'Username may only contain letters, digits, "_", "." and "-".'),
  password: z.string({ required_error: 'Please enter a password.' }).min(8, 'Password must be at least 8 characters.'),
});

const registrationSchema = credentialsSchema.extend({
  accessCode: z.string({ required_error: 'Please enter your access code.' }).trim().min(1, 'Please enter your access code.'),
});

const loginSchema = z.object({ username: z.string().trim(), password: z.string() });

export class AuthService {
  private readonly hashRounds: number;

  constructor(private readonly users: UserStore, private readonly options: AuthOptions) {
    this.hashRounds = options.hashRounds ?? 10;
  }

  /**
   * Registriert einen Nutzer mit einem Einmal-Code.
   * Erst der Code (bedingtes Update im Store), dann der Name: ohne gültigen Code keine Auskunft über vergebene Namen.
   * Scheitert danach das Anlegen, wird der Code wieder freigegeben.
   */
  async register(input: unknown): Promise<SessionContext> {
    const parsed = registrationSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError(parsed.error.issues[0].message);
    }
    const { username, password, accessCode } = parsed.data;

    const claimed = await this.users.claimAccessCode(accessCode, username);
    if (!claimed) {
      throw new ValidationError('Invalid or already used access code.');
    }

    let created = false;
    try {
      if (!(await this.users.findUser(username))) {
        const passwordHash = await bcrypt.hash(password, this.hashRounds);
        created = await this.users.createUser({ username, passwordHash });
      }
    } catch (err) {
      await this.release(accessCode, username);
      throw err;
    }
    if (!created) {
      await this.release(accessCode, username);
      throw new ConflictError('Username is already taken.');
    }

    logger.info(`registered user ${username}`);
    return { username };
  }

  async login(input: unknown): Promise<SessionContext> {
    const parsed = loginSchema.safeParse(input);
    if (!parsed.success) {
      throw new AuthError();
    }
    const { username, password } = parsed.data;

    const user = await this.users.findUser(username);
    if (!user || !(await bcrypt.compare(password, user.passwordHash))) {
      throw new AuthError();
    }
    return { username: user.username };
  }

  issueToken(session: SessionContext): string {
    return jwt.sign({}, this.options.secret, {
      subject: session.username,
      expiresIn: this.options.ttlSeconds,
    });
  }

  /** `undefined` für abgelaufene, manipulierte oder fremde Tokens */
  verifyToken(token: string): SessionContext | undefined {
    try {
      const payload = jwt.verify(token, this.options.secret);
      if (typeof payload === 'string' || typeof payload.sub !== 'string') return undefined;
      return { username: payload.sub };
    } catch (err) {
      if (err instanceof jwt.JsonWebTokenError) return undefined;
      throw err;
    }
  }

  /** Gibt einen eingelösten Code frei; ein Fehler dabei wird nur geloggt, der ursprüngliche Fehler bleibt. */
  private async release(accessCode: string, username: string): Promise<void> {
    try {
      await this.users.releaseAccessCode(accessCode, username);
    } catch (err) {
      logger.error(`could not release access code for ${username}`, err);
    }
  }
}
