export {
  parseEnv,
  createConfig,
  EnvSchema,
  DEFAULT_PLEDGES_SOURCE,
  DEFAULT_PAYMENTS_SOURCE,
  type Env,
  type AppConfig,
} from './env.js';
