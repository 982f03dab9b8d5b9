import { ConfigModule } from '@nestjs/config';
import { validateEnv } from './env.validation';

/**
 * Loads `.env` into `process.env` as soon as this file is imported. Decorator
 * options such as the delivery worker's are read from `process.env` when
 * their module loads, so this must be the root module's first import.
 */
export const AppConfigModule = ConfigModule.forRoot({
  isGlobal: true,
  validate: validateEnv,
});
