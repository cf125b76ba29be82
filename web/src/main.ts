// web/src/main.ts
import { createApp } from './app/app';
import { loadConfig } from './app/config';
import { logger } from './app/logger';
import { createSupabaseStore } from './app/services/supabase.store';

function bootstrap(): void {
  const config = loadConfig();
  const store = createSupabaseStore(config.supabase);
  const app = createApp({ users: store, habits: store, session: config.session });

  app.listen(config.port, () => {
    logger.info(`listening on http://localhost:${config.port}`);
  });
}

try {
  bootstrap();
} catch (err) {
  logger.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
}
